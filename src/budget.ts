import type { BudgetedMessage } from "./types.js";

export const MAX_POST_CHARS = 280;

/** Length in code points, so an emoji counts once. */
export function postLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Joins the body lines and appends as many hashtags as fit. Hashtags are
 * dropped from the end one at a time; the body is never shortened, so an
 * oversized body is returned as-is.
 */
export function budgetMessage(
  lines: string[],
  hashtags: string[],
  maxChars: number = MAX_POST_CHARS
): BudgetedMessage {
  const body = lines.join("\n");
  const kept = [...hashtags];

  while (kept.length > 0) {
    const candidate = `${body}\n${kept.join(" ")}`;
    const length = postLength(candidate);
    if (length <= maxChars) {
      return { text: candidate, hashtags: kept, length, withinBudget: true };
    }
    kept.pop();
  }

  const length = postLength(body);
  return { text: body, hashtags: [], length, withinBudget: length <= maxChars };
}
