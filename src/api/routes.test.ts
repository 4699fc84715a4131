import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import fs from "fs";
import os from "os";
import path from "path";
import pino from "pino";
import { z } from "zod";
import { createApp } from "../app.js";
import { createOrchestrator } from "../plugin/createOrchestrator.js";
import { createRetriever } from "../core/retriever.js";
import { createResponder } from "../core/responder.js";
import { createLogNotifier } from "../outbound/notifier.js";
import { FileStore } from "../store/file.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config.js";
import { PENDING_NOTICE } from "./adapters.js";
import { listen } from "../testing/http.js";
import type { LLMCapability } from "../llm/provider.js";

const ADMIN_KEY = "test-secret";

const ErrorBody = z.object({ ok: z.literal(false), error: z.string(), message: z.string().optional() });
const CasesBody = z.object({
  cases: z.array(z.object({ id: z.string(), status: z.string(), supervisorId: z.string().nullable() }))
});
const ConversationBody = z.object({ conversation: z.object({ messages: z.array(z.object({ role: z.string() })) }) });
const ConversationsBody = z.object({ conversations: z.array(z.object({ id: z.string(), state: z.string() })) });
const EventsBody = z.object({ events: z.array(z.object({ type: z.string() })) });

async function read<T extends z.ZodTypeAny>(r: Response, schema: T): Promise<z.infer<T>> {
  return schema.parse(await r.json());
}

describe("HTTP API", () => {
  let dir: string;
  let server: { url: string; close: () => Promise<void> };

  // confident unless the user mentions a refund
  const llm: LLMCapability = {
    name: "fake",
    async generate(prompt) {
      const last = prompt[prompt.length - 1]?.content ?? "";
      return last.includes("refund")
        ? { text: "Refunds take a few days.", confidence: 0.4 }
        : { text: "Use the reset link.", confidence: 0.95 };
    }
  };

  before(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-api-"));
    const store = new FileStore(dir);
    await store.init();
    const log = pino({ level: "silent" });
    const orchestrator = createOrchestrator({
      store,
      retriever: createRetriever({ name: "empty", query: async () => [] }, { timeoutMs: 200 }),
      responder: createResponder({ llm, maxHistoryTurns: 10, timeoutMs: 200 }),
      notifier: createLogNotifier(log),
      config: { ...DEFAULT_PIPELINE_CONFIG, retry: { ...DEFAULT_PIPELINE_CONFIG.retry, backoffMs: 0 } },
      logger: log
    });
    server = await listen(createApp({
      orchestrator,
      log,
      adminKey: ADMIN_KEY,
      rateLimit: { windowMs: 60_000, max: 1000 },
      googleChatToken: "chat-token"
    }));
  });

  after(async () => {
    await server.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const post = (p: string, body: unknown, headers: Record<string, string> = {}) =>
    fetch(`${server.url}${p}`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body)
    });
  const get = (p: string, headers: Record<string, string> = {}) => fetch(`${server.url}${p}`, { headers });
  const admin = { "x-admin-key": ADMIN_KEY };

  it("reports health", async () => {
    const r = await get("/api/health");
    assert.strictEqual(r.status, 200);
    assert.deepStrictEqual(await r.json(), { ok: true });
  });

  it("answers an inbound message", async () => {
    const r = await post("/api/messages", {
      conversationId: "web-1",
      channel: "web",
      role: "user",
      text: "How do I reset my password?",
      timestamp: "2024-01-01T09:00:00.000Z"
    });
    assert.strictEqual(r.status, 200);
    assert.deepStrictEqual(await r.json(), { ok: true, status: "sent", reply: "Use the reset link." });
  });

  it("maps validation failures to 400", async () => {
    const r = await post("/api/messages", { conversationId: "web-1", channel: "web", role: "user", text: "", timestamp: "2024-01-01T09:00:00.000Z" });
    assert.strictEqual(r.status, 400);
    const body = await read(r, ErrorBody);
    assert.strictEqual(body.error, "validation_error");
  });

  it("rejects malformed JSON", async () => {
    const r = await fetch(`${server.url}/api/messages`, { method: "POST", headers: { "Content-Type": "application/json" }, body: "{" });
    assert.strictEqual(r.status, 400);
    assert.strictEqual((await read(r, ErrorBody)).error, "invalid_json");
  });

  it("guards supervisor routes with the admin key", async () => {
    assert.deepStrictEqual(await (await get("/api/cases")).json(), { ok: false, error: "missing_admin_key" });
    const wrong = await get("/api/cases", { "x-admin-key": "nope" });
    assert.strictEqual(wrong.status, 401);
    assert.deepStrictEqual(await wrong.json(), { ok: false, error: "invalid_admin_key" });
  });

  it("lets a supervisor list and resolve a case", async () => {
    const sent = await post("/api/messages", {
      conversationId: "web-2",
      channel: "web",
      role: "user",
      text: "Where is my refund?",
      timestamp: "2024-01-01T09:05:00.000Z"
    });
    assert.deepStrictEqual(await sent.json(), { ok: true, status: "pending" });

    const list = await read(await get("/api/cases?status=pending&conversationId=web-2", admin), CasesBody);
    assert.strictEqual(list.cases.length, 1);
    const caseId = list.cases[0]?.id;
    assert.ok(caseId);

    const decided = await post(`/api/cases/${caseId}/decision`, { decision: "approved", supervisorId: "sup-1" }, admin);
    assert.deepStrictEqual(await decided.json(), { ok: true, status: "resolved" });

    const again = await post(`/api/cases/${caseId}/decision`, { decision: "approved", supervisorId: "sup-1" }, admin);
    assert.strictEqual(again.status, 409);
    assert.strictEqual((await read(again, ErrorBody)).error, "invalid_state");

    const conv = await read(await get("/api/conversations/web-2", admin), ConversationBody);
    assert.deepStrictEqual(conv.conversation.messages.map(m => m.role), ["user", "bot"]);

    const idle = await read(await get("/api/conversations?state=idle", admin), ConversationsBody);
    assert.ok(idle.conversations.some(c => c.id === "web-2"));

    const events = await read(await get("/api/conversations/web-2/events", admin), EventsBody);
    assert.deepStrictEqual(events.events.map(e => e.type), ["message_received", "escalated", "case_resolved"]);
  });

  it("answers 404 for unknown conversations and routes", async () => {
    const r = await get("/api/conversations/missing", admin);
    assert.strictEqual(r.status, 404);
    assert.deepStrictEqual(await r.json(), { ok: false, error: "not_found", message: "conversation missing not found" });
    assert.strictEqual((await get("/api/nothing-here")).status, 404);
  });

  it("accepts Google Chat messages and card clicks", async () => {
    const message = {
      type: "MESSAGE",
      token: "chat-token",
      space: { name: "spaces/AAA" },
      message: {
        text: "@Helper Where is my refund?",
        argumentText: " Where is my refund?",
        createTime: "2024-01-01T10:00:00.000Z",
        thread: { name: "spaces/AAA/threads/T1" }
      },
      user: { name: "users/1" }
    };
    const r = await post("/api/adapters/google-chat", message);
    assert.deepStrictEqual(await r.json(), { text: PENDING_NOTICE });

    const list = await read(await get("/api/cases?conversationId=gchat:AAA:T1", admin), CasesBody);
    const caseId = list.cases[0]?.id;
    assert.ok(caseId);

    const click = await post("/api/adapters/google-chat", {
      type: "CARD_CLICKED",
      token: "chat-token",
      user: { name: "users/9", email: "adviser@example.test" },
      action: { actionMethodName: "reject", parameters: [{ key: "caseId", value: caseId }] }
    });
    assert.deepStrictEqual(await click.json(), { text: `Case ${caseId} rejected.` });

    const cases = await read(await get("/api/cases?conversationId=gchat:AAA:T1", admin), CasesBody);
    assert.strictEqual(cases.cases[0]?.status, "rejected");
    assert.strictEqual(cases.cases[0]?.supervisorId, "adviser@example.test");
  });

  it("rejects Google Chat events without the verification token", async () => {
    const r = await post("/api/adapters/google-chat", { type: "MESSAGE", space: { name: "spaces/AAA" }, message: { text: "hi" } });
    assert.strictEqual(r.status, 401);
  });
});
