import { createChildLogger, type Logger } from "../utils/logger.js";
import { SummaryNotFoundError } from "../utils/errors.js";
import { digits, extractBlocks, fenced, line, type BlockGrammar } from "./grammar.js";
import { extractActualContent } from "./diff-content.js";
import type {
  AlertSuggestion,
  DashboardSuggestion,
  ExtractedResponse,
  FileSuggestion,
  SuggestionKind,
} from "./types.js";

const defaultLog = createChildLogger({ module: "extractor" });

export interface ExtractOptions {
  log?: Logger;
}

/** Marker the model emits when it has nothing actionable to say. */
export const NO_FEEDBACK_MARKER = "LGTM";

export const CODE_SUGGESTION_GRAMMAR: BlockGrammar<FileSuggestion> = {
  name: "code-suggestion",
  fields: [line("FILE"), digits("LINE"), fenced("SUGGESTION", "diff")],
  build: ([fileName, lineNum, diff]) => ({
    fileName,
    lineNum,
    content: extractActualContent(diff),
  }),
};

export const DASHBOARD_GRAMMAR: BlockGrammar<DashboardSuggestion> = {
  name: "dashboard",
  fields: [
    line("DASHBOARD"),
    line("TYPE"),
    line("PRIORITY"),
    fenced("QUERIES", "json"),
    fenced("PANELS", "json"),
    fenced("ALERTS", "json"),
  ],
  build: ([name, type, priority, queries, panels, alerts]) => ({
    name,
    type,
    priority,
    queries,
    panels,
    alerts,
  }),
};

export const ALERT_GRAMMAR: BlockGrammar<AlertSuggestion> = {
  name: "alert",
  fields: [
    line("ALERT"),
    line("TYPE"),
    line("PRIORITY"),
    fenced("QUERY"),
    line("DESCRIPTION"),
    line("THRESHOLD"),
    line("DURATION"),
    line("NOTIFICATION"),
    line("RUNBOOK_LINK"),
  ],
  // runbook link ends at a blank line or at end of text
  terminator: "(?:\\n\\n|\\n?$)",
  build: ([name, type, priority, query, description, threshold, duration, notification, runbookLink]) => ({
    name,
    type,
    priority,
    query: query.trim(),
    description,
    threshold,
    duration,
    notification,
    runbookLink,
  }),
};

export function hasNoFeedback(text: string): boolean {
  return text.includes(NO_FEEDBACK_MARKER);
}

function extractUnlessLgtm<T>(text: string, grammar: BlockGrammar<T>, log: Logger): T[] {
  if (hasNoFeedback(text)) {
    log.debug({ grammar: grammar.name }, "Response is LGTM, nothing to extract");
    return [];
  }
  return extractBlocks(text, grammar, log);
}

export function extractCodeSuggestions(text: string, opts: ExtractOptions = {}): FileSuggestion[] {
  return extractUnlessLgtm(text, CODE_SUGGESTION_GRAMMAR, opts.log ?? defaultLog);
}

export function extractDashboardSuggestions(
  text: string,
  opts: ExtractOptions = {}
): DashboardSuggestion[] {
  return extractUnlessLgtm(text, DASHBOARD_GRAMMAR, opts.log ?? defaultLog);
}

export function extractAlertSuggestions(text: string, opts: ExtractOptions = {}): AlertSuggestion[] {
  return extractUnlessLgtm(text, ALERT_GRAMMAR, opts.log ?? defaultLog);
}

const SUMMARY_PATTERN = /SUMMARY:\s*([\s\S]*?)(?:\n\n##|\n\nFILE:|$)/;
const SUMMARY_FALLBACK_PATTERN = /SUMMARY:\s*([\s\S]+)$/;

/**
 * Text after `SUMMARY:` up to the next `## ` section or `FILE:` block, trimmed.
 * Throws `SummaryNotFoundError` when there is no summary section.
 */
export function extractSummary(text: string): string {
  const match = SUMMARY_PATTERN.exec(text) ?? SUMMARY_FALLBACK_PATTERN.exec(text);
  if (!match) throw new SummaryNotFoundError();
  return match[1].trim();
}

/** Runs the requested extractions over one reply. A missing summary leaves `summary` undefined. */
export function extractResponse(
  text: string,
  kinds: readonly SuggestionKind[],
  opts: ExtractOptions = {}
): ExtractedResponse {
  const log = opts.log ?? defaultLog;
  const want = new Set(kinds);

  let summary: string | undefined;
  try {
    summary = extractSummary(text);
  } catch (err) {
    if (!(err instanceof SummaryNotFoundError)) throw err;
    log.warn("No summary section in response");
  }

  return {
    code: want.has("code") ? extractCodeSuggestions(text, { log }) : [],
    dashboards: want.has("dashboards") ? extractDashboardSuggestions(text, { log }) : [],
    alerts: want.has("alerts") ? extractAlertSuggestions(text, { log }) : [],
    summary,
  };
}
