import type { FileSuggestion } from "../extract/types.js";
import type { InlineComment } from "./types.js";

/** Suggestion body GitHub renders with an "apply suggestion" button. */
export function formatSuggestionComment(suggestion: FileSuggestion): string {
  const parts = ["**Observability suggestion**", ""];

  if (suggestion.content) {
    parts.push("```suggestion");
    parts.push(suggestion.content);
    parts.push("```");
  } else {
    parts.push("_The suggested change was empty._");
  }

  return parts.join("\n");
}

/**
 * Anchors a suggestion to its line, or returns `null` when the line reference
 * is not a positive integer.
 */
export function toInlineComment(suggestion: FileSuggestion): InlineComment | null {
  if (!/^\d+$/.test(suggestion.lineNum)) return null;
  const line = Number.parseInt(suggestion.lineNum, 10);
  if (line <= 0) return null;

  return {
    path: suggestion.fileName.trim(),
    line,
    body: formatSuggestionComment(suggestion),
  };
}
