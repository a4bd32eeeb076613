import type { AlertSuggestion, FileSuggestion } from "../extract/types.js";

/** A comment anchored to a line on the right side of the diff. */
export interface InlineComment {
  path: string;
  line: number;
  body: string;
}

export type DashboardOutcome =
  | { status: "created"; name: string; type: string; priority: string; dashboardId: string; widgets: number }
  | { status: "drafted"; name: string; type: string; priority: string; widgets: number }
  | { status: "failed"; name: string; type: string; priority: string; reason: string };

export interface ReviewReport {
  summary: string | undefined;
  inlineComments: InlineComment[];
  /** Suggestions whose line could not be anchored; listed in the body instead. */
  unplacedSuggestions: FileSuggestion[];
  dashboards: DashboardOutcome[];
  alerts: AlertSuggestion[];
  filesReviewed: number;
  durationMs: number;
}

/** Final review ready for posting */
export interface ReviewResult {
  bodyMarkdown: string;
  inlineComments: InlineComment[];
  event: "COMMENT";
}
