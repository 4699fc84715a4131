import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import express from "express";
import type { Response } from "express";
import pino from "pino";
import { createWebhookNotifier, type OutboundReply } from "./notifier.js";
import { StageTimeoutError } from "../core/stage.js";
import { listen } from "../testing/http.js";

const log = pino({ level: "silent" });

const reply: OutboundReply = {
  conversationId: "c-1",
  channel: "web",
  role: "bot",
  text: "Use the reset link.",
  caseId: "case-1"
};

describe("createWebhookNotifier", () => {
  let server: { url: string; close: () => Promise<void> };
  const received: unknown[] = [];
  const held: Response[] = [];

  before(async () => {
    const app = express();
    app.use(express.json());
    app.post("/ok", (req, res) => {
      received.push(req.body);
      res.status(204).end();
    });
    app.post("/down", (_req, res) => {
      res.status(503).send("maintenance");
    });
    app.post("/hang", (_req, res) => {
      held.push(res);
    });
    server = await listen(app);
  });

  after(async () => {
    for (const res of held) res.end();
    await server.close();
  });

  it("posts the reply as JSON", async () => {
    await createWebhookNotifier({ url: `${server.url}/ok`, log }).deliver(reply);
    assert.deepStrictEqual(received, [reply]);
  });

  it("throws on a non-ok response", async () => {
    await assert.rejects(
      createWebhookNotifier({ url: `${server.url}/down`, log }).deliver(reply),
      { message: "reply webhook failed (503): maintenance" }
    );
  });

  it("gives up on an endpoint that never answers", async () => {
    await assert.rejects(
      createWebhookNotifier({ url: `${server.url}/hang`, log, timeoutMs: 50 }).deliver(reply),
      StageTimeoutError
    );
  });
});
