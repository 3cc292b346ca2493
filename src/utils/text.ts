import { createHash } from "node:crypto";

const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

export function hashContent(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

/**
 * Rough token estimate used for context budgeting: about four characters per
 * token, never below the number of words.
 */
export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }
  const words = text.match(WORD_REGEX)?.length ?? 0;
  return Math.max(Math.ceil(text.length / 4), words);
}

export function toSnippet(text: string, maxChars = 280): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 3)}...`;
}
