import { z } from "zod";

const repoConfigSchema = z.object({
  enabled: z.boolean().default(true),
  analyses: z
    .object({
      observability: z.boolean().default(true),
      dashboards: z.boolean().default(true),
      alerts: z.boolean().default(true),
    })
    .default({}),
  llm: z
    .object({
      model: z.string().default("claude-3-7-sonnet-20250219"),
      maxTokens: z.number().int().positive().default(4000),
      temperature: z.number().min(0).max(1).default(0.3),
      customInstructions: z.string().optional(),
    })
    .default({}),
  filters: z
    .object({
      excludePaths: z.array(z.string()).default([]),
      includePaths: z.array(z.string()).optional(),
      maxFiles: z.number().int().positive().default(50),
      maxFileSizeKB: z.number().positive().default(200),
    })
    .default({}),
  dashboards: z
    .object({
      submit: z.boolean().default(true),
    })
    .default({}),
  review: z
    .object({
      postSummary: z.boolean().default(true),
      dismissOnUpdate: z.boolean().default(true),
    })
    .default({}),
});

export type RepoConfig = z.infer<typeof repoConfigSchema>;
export type LLMConfig = RepoConfig["llm"];

export function parseRepoConfig(raw: unknown): RepoConfig {
  return repoConfigSchema.parse(raw ?? {});
}
