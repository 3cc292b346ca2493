import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerAskWithCitationsTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "ask_with_citations",
    {
      title: "Ask With Citations",
      description: "Answers a question from ready documents and returns the cited chunks.",
      inputSchema: {
        question: z.string().min(2).describe("Question for the indexed docs"),
        top_k: z.number().int().min(1).max(10).optional().describe("Retrieval size"),
        document_ids: z
          .array(z.string())
          .optional()
          .describe("Document ids to limit retrieval"),
        conversation_history: z
          .array(
            z.object({
              role: z.enum(["user", "assistant"]),
              content: z.string(),
            }),
          )
          .optional()
          .describe("Earlier turns of the conversation, oldest first"),
      },
    },
    async ({ question, top_k, document_ids, conversation_history }, extra) => {
      try {
        const result = await service.askWithCitations({
          question,
          topK: top_k,
          documentIds: document_ids,
          history: conversation_history,
          signal: extra.signal,
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
