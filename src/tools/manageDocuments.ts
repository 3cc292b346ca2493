import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { jsonResult } from "./toolResult.js";

export function registerDocumentManagementTools(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists documents with their indexing status.",
      inputSchema: {
        status: z
          .enum(["pending", "indexing", "ready", "failed"])
          .optional()
          .describe("Only documents in this status"),
      },
    },
    async ({ status }) => jsonResult({ documents: await service.listDocuments(status) }),
  );

  server.registerTool(
    "delete_document",
    {
      title: "Delete Document",
      description: "Deletes a document and all of its indexed chunks.",
      inputSchema: {
        document_id: z.string().min(1).describe("Document id"),
      },
    },
    async ({ document_id }) => jsonResult(await service.deleteDocument(document_id)),
  );

  server.registerTool(
    "list_dead_letters",
    {
      title: "List Dead Letters",
      description: "Shows indexing jobs that exhausted their retries or were malformed.",
      inputSchema: {},
    },
    async () => jsonResult({ dead_letters: await service.listDeadLetters() }),
  );
}
