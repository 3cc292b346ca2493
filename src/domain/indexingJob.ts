import { z } from "zod";

export const indexingJobSchema = z.object({
  document_id: z.string().min(1),
  content_hash: z.string().regex(/^[a-f0-9]{64}$/, "content_hash must be a sha256 hex digest"),
  enqueued_at: z.string().datetime(),
});

export type IndexingJob = z.infer<typeof indexingJobSchema>;

export function createIndexingJob(
  documentId: string,
  contentHash: string,
  now: Date = new Date(),
): IndexingJob {
  return {
    document_id: documentId,
    content_hash: contentHash,
    enqueued_at: now.toISOString(),
  };
}
