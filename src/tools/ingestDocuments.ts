import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerIngestDocumentTools(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "ingest_document",
    {
      title: "Ingest Document",
      description:
        "Stores a plain-text document and queues it for indexing. Re-using a document_id replaces its content.",
      inputSchema: {
        source: z.string().min(1).describe("Display name or original filename"),
        content: z.string().describe("Plain text content"),
        document_id: z.string().min(1).optional().describe("Existing or caller-assigned id"),
      },
    },
    async ({ source, content, document_id }) => {
      try {
        const result = await service.ingestDocument({
          source,
          content,
          documentId: document_id,
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  server.registerTool(
    "ingest_files",
    {
      title: "Ingest Files",
      description: "Reads local markdown/text files and queues them for indexing.",
      inputSchema: {
        paths: z.array(z.string()).min(1).describe("File paths to ingest (.md, .txt)"),
      },
    },
    async ({ paths }) => jsonResult(await service.ingestFiles(paths)),
  );
}
