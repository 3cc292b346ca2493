import { ConversationMessage, GenerationRequest } from "./types.js";

export const SYSTEM_PROMPT = [
  "You are a strict RAG assistant that answers questions from the provided context documents.",
  "Use only the information in the context.",
  'If the context does not contain the answer, say "I don\'t have enough information to answer this question based on the provided documents."',
  "Cite the evidence you use as [1], [2].",
].join(" ");

export function buildUserPrompt(request: GenerationRequest): string {
  return `Context:\n${request.context}\n\nQuestion: ${request.question}\n\nAnswer:`;
}

/** Most recent turns of caller history forwarded to the model. */
export const MAX_HISTORY_MESSAGES = 8;

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export function buildChatMessages(request: GenerationRequest): ChatMessage[] {
  const history: ConversationMessage[] = (request.history ?? []).slice(-MAX_HISTORY_MESSAGES);
  return [
    { role: "system", content: SYSTEM_PROMPT },
    ...history.map((message) => ({ role: message.role, content: message.content })),
    { role: "user", content: buildUserPrompt(request) },
  ];
}
