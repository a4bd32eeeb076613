/** Raised when a response carries no `SUMMARY:` section at all. */
export class SummaryNotFoundError extends Error {
  constructor() {
    super("could not extract summary from response");
    this.name = "SummaryNotFoundError";
  }
}

export type FragmentKind = "queries" | "panels" | "alerts";

/** A dashboard suggestion's queries/panels/alerts text is not a JSON array of objects. */
export class FragmentParseError extends Error {
  readonly fragment: FragmentKind;

  constructor(fragment: FragmentKind, detail: string) {
    super(`error parsing ${fragment} JSON: ${detail}`);
    this.name = "FragmentParseError";
    this.fragment = fragment;
  }
}

export class DashboardSubmissionError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(status === undefined ? message : `${message} (status ${status})`);
    this.name = "DashboardSubmissionError";
    this.status = status;
  }
}

/**
 * Pulls an HTTP status off an SDK error. Octokit and Anthropic expose `status`,
 * the Datadog client exposes `code`.
 */
export function getErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("code" in err && typeof err.code === "number") return err.code;
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
