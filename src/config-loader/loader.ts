import type { Octokit } from "@octokit/rest";
import yaml from "js-yaml";
import { parseRepoConfig, type RepoConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { getErrorStatus } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

export const CONFIG_FILENAME = ".tracelens.yml";

export async function loadRepoConfig(
  octokit: Octokit,
  owner: string,
  repo: string,
  ref: string
): Promise<RepoConfig> {
  let content: string;
  try {
    const { data } = await octokit.repos.getContent({ owner, repo, path: CONFIG_FILENAME, ref });
    if (Array.isArray(data) || !("content" in data) || !data.content) {
      log.debug({ owner, repo }, "Config path has no file content, using defaults");
      return DEFAULT_CONFIG;
    }
    content = Buffer.from(data.content, "base64").toString("utf-8");
  } catch (err) {
    if (getErrorStatus(err) === 404) {
      log.debug({ owner, repo }, `No ${CONFIG_FILENAME} found, using defaults`);
    } else {
      log.warn({ err, owner, repo }, `Failed to fetch ${CONFIG_FILENAME}, using defaults`);
    }
    return DEFAULT_CONFIG;
  }

  return parseConfigYaml(content, { owner, repo });
}

/** YAML text to a config merged over the defaults. Invalid YAML or schema errors fall back to defaults. */
export function parseConfigYaml(
  content: string,
  where: Record<string, unknown> = {}
): RepoConfig {
  try {
    return mergeConfigs(DEFAULT_CONFIG, parseRepoConfig(yaml.load(content)));
  } catch (err) {
    log.warn({ err, ...where }, `Invalid ${CONFIG_FILENAME}, using defaults`);
    return DEFAULT_CONFIG;
  }
}

function mergeConfigs(defaults: RepoConfig, overrides: RepoConfig): RepoConfig {
  return {
    enabled: overrides.enabled,
    analyses: { ...defaults.analyses, ...overrides.analyses },
    llm: { ...defaults.llm, ...overrides.llm },
    filters: {
      ...defaults.filters,
      ...overrides.filters,
      excludePaths: [...new Set([...defaults.filters.excludePaths, ...overrides.filters.excludePaths])],
    },
    dashboards: { ...defaults.dashboards, ...overrides.dashboards },
    review: { ...defaults.review, ...overrides.review },
  };
}
