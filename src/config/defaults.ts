import type { RepoConfig } from "../config-loader/schema.js";

export const DEFAULT_CONFIG: RepoConfig = {
  enabled: true,
  analyses: {
    observability: true,
    dashboards: true,
    alerts: true,
  },
  llm: {
    model: "claude-3-7-sonnet-20250219",
    maxTokens: 4000,
    temperature: 0.3,
  },
  filters: {
    excludePaths: [
      "package-lock.json",
      "go.sum",
      "*.min.js",
      "dist/**",
      "vendor/**",
      "node_modules/**",
    ],
    maxFiles: 50,
    maxFileSizeKB: 200,
  },
  dashboards: {
    submit: true,
  },
  review: {
    postSummary: true,
    dismissOnUpdate: true,
  },
};
