import { classifyDiffLine } from "../utils/diff-parser.js";

const FILE_HEADER = /^(?:---|\+\+\+) /;

/**
 * Reduces a fenced diff body to the text the suggestion should contain.
 *
 * Added lines win: when any are present only they are kept, without their `+`.
 * A body with no `+` lines at all (the model dropped the markers) keeps its
 * context lines instead. Removed lines, hunk headers and a leading
 * `---`/`+++` file header are never kept. Order is preserved and trailing
 * blank lines are dropped.
 */
export function extractActualContent(diffBody: string): string {
  const lines = diffBody.split("\n");

  let start = 0;
  while (start < lines.length && FILE_HEADER.test(lines[start])) start++;

  const added: string[] = [];
  const context: string[] = [];
  for (const raw of lines.slice(start)) {
    const { kind, content } = classifyDiffLine(raw.replace(/\r$/, ""));
    if (kind === "add") added.push(content);
    else if (kind === "context") context.push(content);
  }

  const kept = added.length > 0 ? added : context;
  while (kept.length > 0 && kept[kept.length - 1].trim() === "") kept.pop();
  return kept.join("\n");
}
