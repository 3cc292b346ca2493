import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves top matching chunks from ready documents.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
        document_ids: z
          .array(z.string())
          .optional()
          .describe("Document ids to limit the search"),
      },
    },
    async ({ query, top_k, document_ids }, extra) => {
      try {
        const result = await service.searchChunks({
          query,
          topK: top_k,
          documentIds: document_ids,
          signal: extra.signal,
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
