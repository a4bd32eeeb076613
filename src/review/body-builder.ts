import { BOT_REVIEW_TAG } from "../github/reviews.js";
import type { AlertSuggestion, FileSuggestion } from "../extract/types.js";
import type { DashboardOutcome, ReviewReport } from "./types.js";

/**
 * Markdown body for the review: summary, suggestions that could not be placed
 * inline, dashboard outcomes, proposed alerts and a stats footer.
 */
export function buildReviewBody(report: ReviewReport): string {
  const parts: string[] = [BOT_REVIEW_TAG, "## Observability Review\n"];

  parts.push(report.summary ? report.summary : "_The model did not provide a summary._");
  parts.push("");

  if (report.unplacedSuggestions.length > 0) {
    parts.push("### Other Suggestions\n");
    parts.push(...report.unplacedSuggestions.flatMap(formatUnplaced));
    parts.push("");
  }

  if (report.dashboards.length > 0) {
    parts.push("### Dashboards\n");
    parts.push(...report.dashboards.map(formatDashboard));
    parts.push("");
  }

  if (report.alerts.length > 0) {
    parts.push("### Alerts\n");
    parts.push(...formatAlertTable(report.alerts));
    parts.push("");
  }

  const created = report.dashboards.filter((d) => d.status === "created").length;
  parts.push("---");
  parts.push(
    `${report.filesReviewed} files | ${report.inlineComments.length} inline suggestions | ` +
      `${created}/${report.dashboards.length} dashboards created | ${report.alerts.length} alerts | ` +
      `${(report.durationMs / 1000).toFixed(1)}s`
  );

  return parts.join("\n");
}

function formatUnplaced(s: FileSuggestion): string[] {
  return [`- **\`${s.fileName}\`** (line ${s.lineNum})`, "", "```", s.content, "```"];
}

function formatDashboard(d: DashboardOutcome): string {
  const head = `- **${d.name}** (${d.type}, ${d.priority} priority)`;
  switch (d.status) {
    case "created":
      return `${head}: created \`${d.dashboardId}\` with ${d.widgets} widget(s)`;
    case "drafted":
      return `${head}: drafted with ${d.widgets} widget(s), not submitted`;
    case "failed":
      return `${head}: could not be built: ${d.reason}`;
  }
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

function formatAlertTable(alerts: AlertSuggestion[]): string[] {
  const rows = [
    "| Alert | Priority | Description | Threshold | Duration | Notify | Runbook |",
    "|---|---|---|---|---|---|---|",
  ];
  for (const a of alerts) {
    const cells = [a.name, a.priority, a.description, a.threshold, a.duration, a.notification, a.runbookLink];
    rows.push(`| ${cells.map(escapeCell).join(" | ")} |`);
  }
  for (const a of alerts) {
    rows.push("", `**${a.name}** query:`, "```", a.query, "```");
  }
  return rows;
}
