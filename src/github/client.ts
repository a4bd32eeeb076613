import { Octokit } from "@octokit/rest";
import { createAppAuth } from "@octokit/auth-app";
import { loadEnv } from "../config/env.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "github-client" });

// Installation tokens live for an hour; refresh the client a little earlier.
const CLIENT_TTL_MS = 50 * 60 * 1000;

const clientCache = new Map<number, { octokit: Octokit; expiresAt: number }>();

export function getOctokit(installationId: number): Octokit {
  const cached = clientCache.get(installationId);
  if (cached && cached.expiresAt > Date.now()) return cached.octokit;

  const env = loadEnv();
  const octokit = new Octokit({
    authStrategy: createAppAuth,
    auth: {
      appId: env.GITHUB_APP_ID,
      privateKey: env.GITHUB_PRIVATE_KEY,
      installationId,
    },
  });

  clientCache.set(installationId, { octokit, expiresAt: Date.now() + CLIENT_TTL_MS });
  log.debug({ installationId }, "Created installation client");
  return octokit;
}
