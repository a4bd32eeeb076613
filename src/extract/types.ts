/** An inline code change the model wants applied at `fileName:lineNum`. */
export interface FileSuggestion {
  fileName: string;
  /** Kept as text; not every model reply puts a usable number here. */
  lineNum: string;
  content: string;
}

/**
 * A dashboard the model proposes. `queries`, `panels` and `alerts` are the raw
 * fenced JSON bodies; they are only parsed at synthesis time.
 */
export interface DashboardSuggestion {
  name: string;
  /** Backend discriminator, e.g. "grafana" or "amplitude". */
  type: string;
  priority: string;
  queries: string;
  panels: string;
  alerts: string;
}

export interface AlertSuggestion {
  name: string;
  type: string;
  priority: string;
  query: string;
  description: string;
  threshold: string;
  duration: string;
  notification: string;
  runbookLink: string;
}

export type SuggestionKind = "code" | "dashboards" | "alerts";

export interface ExtractedResponse {
  code: FileSuggestion[];
  dashboards: DashboardSuggestion[];
  alerts: AlertSuggestion[];
  /** Undefined when the reply has no `SUMMARY:` section. */
  summary: string | undefined;
}
