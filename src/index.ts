import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.js";
import { createWebhookRouter } from "./webhook/handler.js";
import { getLogger } from "./utils/logger.js";

const VERSION = "0.1.0";

function createApp(webhookSecret?: string): Hono {
  const app = new Hono();

  app.get("/health", (c) =>
    c.json({ status: "ok", version: VERSION, timestamp: new Date().toISOString() })
  );
  app.route("/webhook", createWebhookRouter(webhookSecret));

  return app;
}

function main(): void {
  const env = loadEnv();
  const log = getLogger();
  const app = createApp(env.GITHUB_WEBHOOK_SECRET);

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port }, "tracelens server started");
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "Shutting down...");
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err) {
  console.error("Fatal startup error:", err);
  process.exit(1);
}
