import type { EmitterWebhookEvent } from "@octokit/webhooks";
import type { PRContext } from "../github/pulls.js";
import { orchestrateReview } from "../review/orchestrator.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "webhook-events" });

type PREvent = EmitterWebhookEvent<"pull_request">;

const REVIEWABLE_ACTIONS = new Set(["opened", "synchronize", "reopened"]);

/** Builds the review context, or returns `null` when the event should not trigger a review. */
export function toReviewContext(event: PREvent): PRContext | null {
  const { action, pull_request: pr } = event.payload;
  // not every pull_request payload variant carries an installation
  const installation = "installation" in event.payload ? event.payload.installation : undefined;

  if (!REVIEWABLE_ACTIONS.has(action)) {
    log.debug({ action, pr: pr.number }, "Skipping non-reviewable PR action");
    return null;
  }
  if (pr.draft) {
    log.info({ pr: pr.number }, "Skipping draft PR");
    return null;
  }
  if (!installation?.id) {
    log.error({ pr: pr.number }, "No installation ID in webhook payload");
    return null;
  }

  const owner = pr.base.repo.owner?.login;
  if (!owner) {
    log.error({ pr: pr.number }, "No repository owner in webhook payload");
    return null;
  }

  return {
    owner,
    repo: pr.base.repo.name,
    pullNumber: pr.number,
    headSha: pr.head.sha,
    headRef: pr.head.ref,
    baseRef: pr.base.ref,
    installationId: installation.id,
  };
}

export async function handlePullRequest(event: PREvent): Promise<void> {
  const ctx = toReviewContext(event);
  if (!ctx) return;

  log.info(
    { owner: ctx.owner, repo: ctx.repo, pr: ctx.pullNumber, action: event.payload.action },
    "Processing PR event"
  );

  try {
    await orchestrateReview(ctx, event.payload.action === "synchronize");
  } catch (err) {
    log.error({ err, pr: ctx.pullNumber }, "Review orchestration failed");
  }
}
