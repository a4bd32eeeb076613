import type { Octokit } from "@octokit/rest";
import type { PRContext } from "./pulls.js";
import type { ReviewResult } from "../review/types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-reviews" });

export const BOT_REVIEW_TAG = "<!-- tracelens-review -->";

export async function postReview(
  octokit: Octokit,
  ctx: PRContext,
  result: ReviewResult
): Promise<number> {
  const comments = result.inlineComments.map((c) => ({
    path: c.path,
    line: c.line,
    side: "RIGHT" as const,
    body: c.body,
  }));

  const { data } = await octokit.pulls.createReview({
    owner: ctx.owner,
    repo: ctx.repo,
    pull_number: ctx.pullNumber,
    commit_id: ctx.headSha,
    body: result.bodyMarkdown,
    event: result.event,
    comments,
  });

  log.info(
    { pr: ctx.pullNumber, reviewId: data.id, commentCount: comments.length },
    "Posted review"
  );
  return data.id;
}

/** Dismisses our earlier reviews; GitHub refuses for plain COMMENTED ones, which is logged and ignored. */
export async function dismissPreviousReviews(octokit: Octokit, ctx: PRContext): Promise<void> {
  const { data: reviews } = await octokit.pulls.listReviews({
    owner: ctx.owner,
    repo: ctx.repo,
    pull_number: ctx.pullNumber,
  });

  const ours = reviews.filter(
    (r) => r.body?.includes(BOT_REVIEW_TAG) && (r.state === "CHANGES_REQUESTED" || r.state === "COMMENTED")
  );

  for (const review of ours) {
    try {
      await octokit.pulls.dismissReview({
        owner: ctx.owner,
        repo: ctx.repo,
        pull_number: ctx.pullNumber,
        review_id: review.id,
        message: "Superseded by a new observability review after push.",
      });
      log.info({ reviewId: review.id }, "Dismissed old review");
    } catch (err) {
      log.debug({ reviewId: review.id, err }, "Could not dismiss review");
    }
  }
}
