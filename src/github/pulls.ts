import type { Octokit } from "@octokit/rest";
import { parsePatch, type ParsedFile } from "../utils/diff-parser.js";
import type { RepoConfig } from "../config-loader/schema.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-pulls" });

const PAGE_SIZE = 100;

export interface PRContext {
  owner: string;
  repo: string;
  pullNumber: number;
  headSha: string;
  headRef: string;
  baseRef: string;
  installationId: number;
}

export interface PRFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  changes: number;
  patch?: string;
}

export async function fetchPRFiles(octokit: Octokit, ctx: PRContext): Promise<PRFile[]> {
  const files: PRFile[] = [];

  for (let page = 1; ; page++) {
    const { data } = await octokit.pulls.listFiles({
      owner: ctx.owner,
      repo: ctx.repo,
      pull_number: ctx.pullNumber,
      per_page: PAGE_SIZE,
      page,
    });

    files.push(
      ...data.map((f) => ({
        filename: f.filename,
        status: f.status,
        additions: f.additions,
        deletions: f.deletions,
        changes: f.changes,
        patch: f.patch,
      }))
    );

    if (data.length < PAGE_SIZE) break;
  }

  log.info(
    { owner: ctx.owner, repo: ctx.repo, pr: ctx.pullNumber, fileCount: files.length },
    "Fetched PR files"
  );
  return files;
}

/** Applies exclude/include globs and size limits, then caps the count at `maxFiles`. */
export function filterFiles(files: PRFile[], filters: RepoConfig["filters"]): PRFile[] {
  return files
    .filter((f) => {
      if (filters.excludePaths.some((p) => matchGlob(f.filename, p))) return false;

      if (filters.includePaths && filters.includePaths.length > 0) {
        if (!filters.includePaths.some((p) => matchGlob(f.filename, p))) return false;
      }

      // removed files have nothing to instrument
      if (f.status === "removed") return false;

      return (f.patch?.length ?? 0) / 1024 <= filters.maxFileSizeKB;
    })
    .slice(0, filters.maxFiles);
}

/**
 * `**` spans directories, `*` stays within one path segment.
 * A pattern without a slash also matches the file's basename.
 */
export function matchGlob(path: string, pattern: string): boolean {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*\*/g, "\u0000")
    .replace(/\*/g, "[^/]*")
    .replace(/\?/g, "[^/]")
    .replace(/\u0000/g, ".*");
  const regex = new RegExp(`^${source}$`);
  if (regex.test(path)) return true;
  return !pattern.includes("/") && regex.test(path.slice(path.lastIndexOf("/") + 1));
}

export function parseFiles(files: PRFile[]): ParsedFile[] {
  return files.map((f) => parsePatch(f.filename, f.patch, f.status));
}
