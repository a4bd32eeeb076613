import { getOctokit } from "../github/client.js";
import { fetchPRFiles, filterFiles, parseFiles, type PRContext } from "../github/pulls.js";
import { dismissPreviousReviews, postReview } from "../github/reviews.js";
import { loadRepoConfig } from "../config-loader/loader.js";
import type { LLMConfig, RepoConfig } from "../config-loader/schema.js";
import { loadEnv } from "../config/env.js";
import { requestCompletion } from "../llm/completion.js";
import { buildAlertPrompt, buildDashboardPrompt, buildObservabilityPrompt } from "../llm/prompts.js";
import { extractAlertSuggestions, extractResponse } from "../extract/extractor.js";
import type { DashboardSuggestion, FileSuggestion } from "../extract/types.js";
import { synthesizeDashboard } from "../synth/widgets.js";
import { createDatadogDashboard, getDashboardsApi, type DashboardsApi } from "../dashboard/datadog.js";
import type { ParsedFile } from "../utils/diff-parser.js";
import { errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { buildReviewBody } from "./body-builder.js";
import { toInlineComment } from "./inline-formatter.js";
import type { DashboardOutcome, InlineComment, ReviewReport } from "./types.js";

const log = createChildLogger({ module: "orchestrator" });

export interface AnalysisDeps {
  complete: (prompt: string, llm: LLMConfig) => Promise<string>;
  /** `null` drafts dashboards without submitting them. */
  dashboardsApi: DashboardsApi | null;
}

export type AnalysisReport = Omit<ReviewReport, "filesReviewed" | "durationMs">;

export async function orchestrateReview(ctx: PRContext, isSynchronize: boolean): Promise<void> {
  const startTime = Date.now();
  const octokit = getOctokit(ctx.installationId);

  // 1. Load repo config
  const config = await loadRepoConfig(octokit, ctx.owner, ctx.repo, ctx.headRef);
  if (!config.enabled) {
    log.info({ pr: ctx.pullNumber }, "Reviews disabled for this repo");
    return;
  }

  // 2. Dismiss stale reviews after a push
  if (isSynchronize && config.review.dismissOnUpdate) {
    await dismissPreviousReviews(octokit, ctx);
  }

  // 3. Fetch, filter and parse PR files
  const rawFiles = await fetchPRFiles(octokit, ctx);
  const files = parseFiles(filterFiles(rawFiles, config.filters));
  if (files.length === 0) {
    log.info({ pr: ctx.pullNumber }, "No reviewable files in PR");
    return;
  }

  // 4. Ask the model and turn its replies into suggestions, dashboards and alerts
  const env = loadEnv();
  const analysis = await analyzeChanges(files, config, {
    complete: (prompt, llm) => requestCompletion(prompt, llm),
    dashboardsApi: config.dashboards.submit ? getDashboardsApi(env) : null,
  });

  const hasFindings =
    analysis.inlineComments.length > 0 ||
    analysis.unplacedSuggestions.length > 0 ||
    analysis.dashboards.length > 0 ||
    analysis.alerts.length > 0;
  if (!hasFindings && !config.review.postSummary) {
    log.info({ pr: ctx.pullNumber }, "Nothing to report, skipping review");
    return;
  }

  // 5. Post one review
  const durationMs = Date.now() - startTime;
  const bodyMarkdown = buildReviewBody({ ...analysis, filesReviewed: files.length, durationMs });
  const reviewId = await postReview(octokit, ctx, {
    bodyMarkdown,
    inlineComments: analysis.inlineComments,
    event: "COMMENT",
  });

  log.info(
    {
      pr: ctx.pullNumber,
      reviewId,
      inline: analysis.inlineComments.length,
      dashboards: analysis.dashboards.length,
      alerts: analysis.alerts.length,
      durationMs,
    },
    "Review complete"
  );
}

/**
 * Runs every enabled analysis over the parsed files. A failed model call or a
 * dashboard that cannot be built is logged and left out; the rest still run.
 */
export async function analyzeChanges(
  files: ParsedFile[],
  config: RepoConfig,
  deps: AnalysisDeps
): Promise<AnalysisReport> {
  const report: AnalysisReport = {
    summary: undefined,
    inlineComments: [],
    unplacedSuggestions: [],
    dashboards: [],
    alerts: [],
  };
  const summaries: string[] = [];
  const commentable = commentableLines(files);

  if (config.analyses.observability) {
    const reply = await ask("observability", buildObservabilityPrompt(files, config.llm), config, deps);
    if (reply !== null) {
      const extracted = extractResponse(reply, ["code"], { log });
      if (extracted.summary) summaries.push(extracted.summary);
      placeSuggestions(extracted.code, commentable, report);
    }
  }

  if (config.analyses.dashboards) {
    const reply = await ask("dashboards", buildDashboardPrompt(files, config.llm), config, deps);
    if (reply !== null) {
      const extracted = extractResponse(reply, ["dashboards"], { log });
      if (extracted.summary) summaries.push(extracted.summary);
      for (const suggestion of extracted.dashboards) {
        report.dashboards.push(await buildDashboard(suggestion, deps.dashboardsApi));
      }
    }
  }

  if (config.analyses.alerts) {
    const reply = await ask("alerts", buildAlertPrompt(files, config.llm), config, deps);
    if (reply !== null) {
      // the alert prompt asks for no summary
      report.alerts.push(...extractAlertSuggestions(reply, { log }));
    }
  }

  report.summary = summaries.length > 0 ? summaries.join("\n\n") : undefined;
  return report;
}

async function ask(
  analysis: string,
  prompt: string,
  config: RepoConfig,
  deps: AnalysisDeps
): Promise<string | null> {
  try {
    return await deps.complete(prompt, config.llm);
  } catch (err) {
    log.error({ err, analysis }, "LLM request failed, skipping analysis");
    return null;
  }
}

/** New-side line numbers per file that GitHub accepts review comments on. */
function commentableLines(files: ParsedFile[]): Map<string, Set<number>> {
  const byFile = new Map<string, Set<number>>();
  for (const file of files) {
    const lines = new Set<number>();
    for (const hunk of file.hunks) {
      for (const line of hunk.lines) {
        if (line.newLineNumber !== null) lines.add(line.newLineNumber);
      }
    }
    byFile.set(file.filename, lines);
  }
  return byFile;
}

function placeSuggestions(
  suggestions: FileSuggestion[],
  commentable: Map<string, Set<number>>,
  report: AnalysisReport
): void {
  const seen = new Set<string>();
  for (const suggestion of suggestions) {
    const comment: InlineComment | null = toInlineComment(suggestion);
    // a comment outside the diff makes GitHub reject the whole review
    if (!comment || !commentable.get(comment.path)?.has(comment.line)) {
      report.unplacedSuggestions.push(suggestion);
      continue;
    }
    const key = `${comment.path}:${comment.line}`;
    if (seen.has(key)) {
      // GitHub allows one suggestion per line; keep the first
      report.unplacedSuggestions.push(suggestion);
      continue;
    }
    seen.add(key);
    report.inlineComments.push(comment);
  }
}

async function buildDashboard(
  suggestion: DashboardSuggestion,
  api: DashboardsApi | null
): Promise<DashboardOutcome> {
  const { name, type, priority } = suggestion;
  try {
    const spec = synthesizeDashboard(suggestion, { log });
    if (!api) {
      return { status: "drafted", name, type, priority, widgets: spec.widgets.length };
    }
    const dashboardId = await createDatadogDashboard(spec, api);
    return { status: "created", name, type, priority, dashboardId, widgets: spec.widgets.length };
  } catch (err) {
    log.warn({ err, dashboard: name }, "Skipping dashboard suggestion");
    return { status: "failed", name, type, priority, reason: errorMessage(err) };
  }
}
