import type { ParsedFile } from "../utils/diff-parser.js";
import type { LLMConfig } from "../config-loader/schema.js";

const FENCE = "```";

export const SYSTEM_PROMPT =
  "You are an observability assistant that reviews code changes and suggests event tracking, " +
  "logging, alerting rules and dashboards. Give specific, actionable recommendations that are " +
  "relevant to the changes and detailed enough to implement.";

/** Renders the PR diff with new-file line numbers on added and context lines. */
export function buildDiffSection(files: ParsedFile[]): string {
  const parts: string[] = ["## Changes\n"];

  for (const file of files) {
    parts.push(`### ${file.filename} (${file.status})`);
    parts.push(`${FENCE}diff`);
    for (const hunk of file.hunks) {
      parts.push(`@@ -${hunk.oldStart},${hunk.oldCount} +${hunk.newStart},${hunk.newCount} @@`);
      for (const line of hunk.lines) {
        if (line.type === "del") {
          parts.push(`-      ${line.content}`);
          continue;
        }
        const prefix = line.type === "add" ? "+" : " ";
        parts.push(`${prefix}L${line.newLineNumber}: ${line.content}`);
      }
    }
    parts.push(`${FENCE}\n`);
  }

  return parts.join("\n");
}

function withCustomInstructions(prompt: string, llm: Pick<LLMConfig, "customInstructions">): string {
  if (!llm.customInstructions) return prompt;
  return `${prompt}\n\n## Custom Instructions from Repository\n${llm.customInstructions}`;
}

export function buildObservabilityPrompt(
  files: ParsedFile[],
  llm: Pick<LLMConfig, "customInstructions">
): string {
  const prompt = `Review the following pull request for missing observability: logging, metrics, tracing and business event tracking.

${buildDiffSection(files)}
## Output Format
Start with a summary of the observability state of the change:

SUMMARY:
<two to five sentences>

Then, for each concrete change you recommend, add one block exactly like this:

FILE: <path of the file as shown above>
LINE: <line number from the new version of the file>
SUGGESTION:
${FENCE}diff
+<line to add>
${FENCE}

Rules:
- LINE must be a single number taken from an L<n> marker above.
- Prefix every line the reader should add with "+".
- One block per location; separate blocks with a blank line.
- If nothing needs to change, reply with a SUMMARY and the single word LGTM.`;

  return withCustomInstructions(prompt, llm);
}

export function buildDashboardPrompt(
  files: ParsedFile[],
  llm: Pick<LLMConfig, "customInstructions">
): string {
  const prompt = `Suggest monitoring dashboards that would let the team watch the behaviour introduced by this pull request.

${buildDiffSection(files)}
## Output Format
SUMMARY:
<why these dashboards matter>

For each dashboard add one block exactly like this:

DASHBOARD: <dashboard name>
TYPE: <grafana|amplitude>
PRIORITY: <high|medium|low>
QUERIES:
${FENCE}json
[{"refId": "A", "expr": "<metrics query>"}]
${FENCE}
PANELS:
${FENCE}json
[{"title": "<panel title>", "gridPos": {"x": 0, "y": 0, "w": 12, "h": 8}, "targets": [{"refId": "A"}]}]
${FENCE}
ALERTS:
${FENCE}json
[{"name": "<alert name>", "condition": "<condition>"}]
${FENCE}

Rules:
- Each JSON body must be a valid JSON array of objects.
- Every target refId must name a query in QUERIES.
- If no dashboard is warranted, reply with a SUMMARY and the single word LGTM.`;

  return withCustomInstructions(prompt, llm);
}

export function buildAlertPrompt(
  files: ParsedFile[],
  llm: Pick<LLMConfig, "customInstructions">
): string {
  const prompt = `Suggest alert rules that would catch failures or regressions in the code changed by this pull request.

${buildDiffSection(files)}
## Output Format
For each alert add one block exactly like this, followed by a blank line:

ALERT: <alert name>
TYPE: <metric|log|apm>
PRIORITY: <P1|P2|P3>
QUERY:
${FENCE}
<monitor query>
${FENCE}
DESCRIPTION: <one line>
THRESHOLD: <value and comparison>
DURATION: <evaluation window>
NOTIFICATION: <channel or team>
RUNBOOK_LINK: <url or "none">

Rules:
- Every field except QUERY fits on one line.
- If no alert is warranted, reply with the single word LGTM.`;

  return withCustomInstructions(prompt, llm);
}
