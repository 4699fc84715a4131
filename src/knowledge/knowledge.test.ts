import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import fs from "fs";
import os from "os";
import path from "path";
import express from "express";
import { FileKnowledgeStore } from "./file.js";
import { HttpKnowledgeStore } from "./http.js";
import { listen } from "../testing/http.js";

const docs = [
  { id: "kb-1", title: "Resetting your password", content: "Use the reset link on the sign-in page.", source: "help/reset", updatedAt: "2024-01-01T00:00:00.000Z" },
  { id: "kb-2", title: "Refund policy", content: "Refunds are issued within 14 days of a return.", source: "help/refunds", updatedAt: "2024-02-01T00:00:00.000Z" }
];

describe("FileKnowledgeStore", () => {
  let dir: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-kb-"));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("scores documents by the share of query terms they contain", async () => {
    const file = path.join(dir, "knowledge.jsonl");
    fs.writeFileSync(file, docs.map(d => JSON.stringify(d)).join("\n") + "\n");

    const store = new FileKnowledgeStore(file);
    assert.strictEqual(store.load(), 2);

    // terms: reset, password, link, today -> kb-1 has three of four
    const out = await store.query("Reset password link today", 5);
    assert.deepStrictEqual(out.map(p => [p.id, p.score]), [["kb-1", 0.75]]);
  });

  it("rejects a malformed document line with its line number", () => {
    const file = path.join(dir, "broken.jsonl");
    fs.writeFileSync(file, JSON.stringify(docs[0]) + "\n" + JSON.stringify({ id: "x" }) + "\n");
    assert.throws(() => new FileKnowledgeStore(file).load(), /broken\.jsonl:2:/);
  });

  it("stops when the query is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(new FileKnowledgeStore(path.join(dir, "unused.jsonl")).query("reset", 3, controller.signal));
  });
});

describe("HttpKnowledgeStore", () => {
  let server: { url: string; close: () => Promise<void> };
  const seen: unknown[] = [];

  before(async () => {
    const app = express();
    app.use(express.json());
    app.post("/search", (req, res) => {
      seen.push({ body: req.body, auth: req.header("authorization") });
      if (req.body.query === "boom") {
        res.status(500).send("index offline");
        return;
      }
      res.json({ passages: [{ ...docs[1], score: 0.6 }] });
    });
    server = await listen(app);
  });

  after(async () => {
    await server.close();
  });

  it("posts the query and parses passages", async () => {
    const store = new HttpKnowledgeStore({ url: `${server.url}/search`, apiKey: "test-secret" });
    const out = await store.query("refund", 3);

    assert.deepStrictEqual(out.map(p => [p.id, p.score]), [["kb-2", 0.6]]);
    assert.deepStrictEqual(seen[0], { body: { query: "refund", k: 3 }, auth: "Bearer test-secret" });
  });

  it("throws on a non-ok response", async () => {
    const store = new HttpKnowledgeStore({ url: `${server.url}/search` });
    await assert.rejects(store.query("boom", 3), { message: "search failed (500): index offline" });
  });
});
