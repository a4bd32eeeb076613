import { Hono } from "hono";
import { Webhooks } from "@octokit/webhooks";
import { loadEnv } from "../config/env.js";
import { handlePullRequest } from "./events.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "webhook-handler" });

type DeliveryEventName = Parameters<Webhooks["verifyAndReceive"]>[0]["name"];

const HANDLED_EVENTS = new Set<string>(["pull_request", "ping"]);

function isHandledEvent(name: string): name is DeliveryEventName {
  return HANDLED_EVENTS.has(name);
}

export function createWebhookRouter(secret: string = loadEnv().GITHUB_WEBHOOK_SECRET): Hono {
  const app = new Hono();
  const webhooks = new Webhooks({ secret });

  webhooks.on("pull_request", handlePullRequest);

  app.post("/", async (c) => {
    const id = c.req.header("x-github-delivery") ?? "";
    const name = c.req.header("x-github-event") ?? "";
    const signature = c.req.header("x-hub-signature-256") ?? "";
    const payload = await c.req.text();

    log.debug({ id, event: name }, "Received webhook");

    if (!isHandledEvent(name)) {
      return c.json({ ok: true, ignored: name }, 202);
    }

    try {
      await webhooks.verifyAndReceive({ id, name, signature, payload });
      return c.json({ ok: true });
    } catch (err) {
      log.error({ err, id }, "Webhook verification/handling failed");
      return c.json({ error: "webhook processing failed" }, 400);
    }
  });

  return app;
}
