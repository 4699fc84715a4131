import { describe, it } from "node:test";
import assert from "node:assert";
import path from "path";
import { DEFAULT_PIPELINE_CONFIG, loadConfig, parsePipelineConfig } from "./config.js";
import { ValidationError } from "./core/errors.js";

describe("parsePipelineConfig", () => {
  it("accepts the defaults", () => {
    assert.deepStrictEqual(parsePipelineConfig(DEFAULT_PIPELINE_CONFIG), DEFAULT_PIPELINE_CONFIG);
  });

  it("rejects unknown options", () => {
    assert.throws(() => parsePipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, temperature: 0.3 }), ValidationError);
    assert.throws(
      () => parsePipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, retry: { ...DEFAULT_PIPELINE_CONFIG.retry, jitter: true } }),
      ValidationError
    );
  });

  it("rejects thresholds outside [0, 1]", () => {
    assert.throws(() => parsePipelineConfig({ ...DEFAULT_PIPELINE_CONFIG, approvalThreshold: 1.5 }), ValidationError);
  });
});

describe("loadConfig", () => {
  it("fills in defaults from an empty environment", () => {
    const config = loadConfig({});
    assert.strictEqual(config.port, 7090);
    assert.strictEqual(config.store, "file");
    assert.deepStrictEqual(config.pipeline, DEFAULT_PIPELINE_CONFIG);
    assert.deepStrictEqual(config.knowledge, { file: path.resolve("./data", "knowledge.jsonl") });
    assert.deepStrictEqual(config.rateLimit, { windowMs: 60_000, max: 60 });
  });

  it("reads pipeline settings and a remote knowledge store", () => {
    const config = loadConfig({
      PII_THRESHOLD: "0.5",
      GENERATION_MAX_ATTEMPTS: "2",
      RETRY_BACKOFF_MS: "250",
      KNOWLEDGE_URL: "http://search.internal.test/query",
      KNOWLEDGE_API_KEY: "test-secret",
      STORE: "sqlite"
    });
    assert.strictEqual(config.pipeline.piiThreshold, 0.5);
    assert.deepStrictEqual(config.pipeline.retry, { generationAttempts: 2, updateAttempts: 5, backoffMs: 250 });
    assert.deepStrictEqual(config.knowledge, { url: "http://search.internal.test/query", apiKey: "test-secret" });
    assert.strictEqual(config.store, "sqlite");
  });

  it("reports bad values as validation errors", () => {
    assert.throws(() => loadConfig({ STORE: "postgres" }), ValidationError);
    assert.throws(() => loadConfig({ APPROVAL_THRESHOLD: "2" }), ValidationError);
  });
});
