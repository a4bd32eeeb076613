export type DiffLineKind = "add" | "del" | "context" | "meta";

export interface DiffLine {
  type: Exclude<DiffLineKind, "meta">;
  content: string;
  oldLineNumber: number | null;
  newLineNumber: number | null;
}

export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: DiffLine[];
}

export interface ParsedFile {
  filename: string;
  status: "added" | "removed" | "modified" | "renamed";
  hunks: DiffHunk[];
  additions: number;
  deletions: number;
}

const HUNK_HEADER = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@/;

/**
 * Classifies one hunk line of unified diff and strips its prefix.
 * Hunk headers and `\ No newline at end of file` markers are `meta`.
 */
export function classifyDiffLine(line: string): { kind: DiffLineKind; content: string } {
  if (line.startsWith("@@") || line.startsWith("\\")) {
    return { kind: "meta", content: line };
  }
  if (line.startsWith("+")) return { kind: "add", content: line.slice(1) };
  if (line.startsWith("-")) return { kind: "del", content: line.slice(1) };
  return { kind: "context", content: line.startsWith(" ") ? line.slice(1) : line };
}

export function parsePatch(filename: string, patch: string | undefined, status: string): ParsedFile {
  const parsed: ParsedFile = {
    filename,
    status: normalizeStatus(status),
    hunks: [],
    additions: 0,
    deletions: 0,
  };

  if (!patch) return parsed;

  let currentHunk: DiffHunk | null = null;
  let oldLine = 0;
  let newLine = 0;

  for (const line of patch.split("\n")) {
    const hunkMatch = HUNK_HEADER.exec(line);
    if (hunkMatch) {
      currentHunk = {
        oldStart: parseInt(hunkMatch[1], 10),
        oldCount: parseInt(hunkMatch[2] ?? "1", 10),
        newStart: parseInt(hunkMatch[3], 10),
        newCount: parseInt(hunkMatch[4] ?? "1", 10),
        lines: [],
      };
      parsed.hunks.push(currentHunk);
      oldLine = currentHunk.oldStart;
      newLine = currentHunk.newStart;
      continue;
    }

    if (!currentHunk) continue;

    const { kind, content } = classifyDiffLine(line);
    switch (kind) {
      case "add":
        currentHunk.lines.push({ type: "add", content, oldLineNumber: null, newLineNumber: newLine });
        newLine++;
        parsed.additions++;
        break;
      case "del":
        currentHunk.lines.push({ type: "del", content, oldLineNumber: oldLine, newLineNumber: null });
        oldLine++;
        parsed.deletions++;
        break;
      case "context":
        currentHunk.lines.push({ type: "context", content, oldLineNumber: oldLine, newLineNumber: newLine });
        oldLine++;
        newLine++;
        break;
      case "meta":
        break;
    }
  }

  return parsed;
}

function normalizeStatus(status: string): ParsedFile["status"] {
  switch (status) {
    case "added":
    case "removed":
    case "renamed":
      return status;
    default:
      return "modified";
  }
}
