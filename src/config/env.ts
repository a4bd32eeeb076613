import { z } from "zod";

const envSchema = z.object({
  // GitHub App
  GITHUB_APP_ID: z.string().min(1),
  GITHUB_PRIVATE_KEY: z.string().min(1),
  GITHUB_WEBHOOK_SECRET: z.string().min(1),

  // Anthropic
  ANTHROPIC_API_KEY: z.string().min(1),

  // Datadog (optional; without keys dashboards are drafted but not created)
  DATADOG_API_KEY: z.string().optional(),
  DATADOG_APP_KEY: z.string().optional(),
  DATADOG_SITE: z.string().default("datadoghq.com"),

  // Server
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const raw = { ...source };

  // GitHub private keys are often stored base64-encoded
  if (raw.GITHUB_PRIVATE_KEY && !raw.GITHUB_PRIVATE_KEY.includes("BEGIN")) {
    raw.GITHUB_PRIVATE_KEY = Buffer.from(raw.GITHUB_PRIVATE_KEY, "base64").toString("utf-8");
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${problems}`);
  }
  return result.data;
}

export function loadEnv(): Env {
  if (!_env) _env = parseEnv(process.env);
  return _env;
}

export function isDatadogEnabled(env: Env): env is Env & { DATADOG_API_KEY: string; DATADOG_APP_KEY: string } {
  return !!(env.DATADOG_API_KEY && env.DATADOG_APP_KEY);
}
