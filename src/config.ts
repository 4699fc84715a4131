import path from "path";
import { z } from "zod";
import { ValidationError } from "./core/errors.js";

/** The only options the pipeline recognises; unknown keys are rejected. */
export const PipelineConfigSchema = z.object({
  piiThreshold: z.number().min(0).max(1),
  approvalThreshold: z.number().min(0).max(1),
  maxHistoryTurns: z.number().int().min(1),
  retry: z.object({
    generationAttempts: z.number().int().min(1),
    updateAttempts: z.number().int().min(1),
    backoffMs: z.number().int().min(0)
  }).strict(),
  timeouts: z.object({
    retrievalMs: z.number().int().min(1),
    generationMs: z.number().int().min(1)
  }).strict()
}).strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  piiThreshold: 0.7,
  approvalThreshold: 0.8,
  maxHistoryTurns: 10,
  retry: { generationAttempts: 4, updateAttempts: 5, backoffMs: 1000 },
  timeouts: { retrievalMs: 5000, generationMs: 60_000 }
};

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(raw);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  return parsed.data;
}

const num = (fallback: number) => z.coerce.number().default(fallback);

const EnvSchema = z.object({
  PORT: num(7090),
  LOG_LEVEL: z.string().default("info"),
  DATA_DIR: z.string().default("./data"),
  STORE: z.enum(["file", "sqlite"]).default("file"),
  ADMIN_KEY: z.string().default(""),
  KNOWLEDGE_FILE: z.string().optional(),
  KNOWLEDGE_URL: z.string().url().optional(),
  KNOWLEDGE_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().optional(),
  REPLY_WEBHOOK_URL: z.string().url().optional(),
  GOOGLE_CHAT_TOKEN: z.string().optional(),
  RATE_LIMIT_WINDOW_MS: num(60_000),
  RATE_LIMIT_MAX: num(60),

  PII_THRESHOLD: num(DEFAULT_PIPELINE_CONFIG.piiThreshold),
  APPROVAL_THRESHOLD: num(DEFAULT_PIPELINE_CONFIG.approvalThreshold),
  MAX_HISTORY_TURNS: num(DEFAULT_PIPELINE_CONFIG.maxHistoryTurns),
  GENERATION_MAX_ATTEMPTS: num(DEFAULT_PIPELINE_CONFIG.retry.generationAttempts),
  UPDATE_MAX_ATTEMPTS: num(DEFAULT_PIPELINE_CONFIG.retry.updateAttempts),
  RETRY_BACKOFF_MS: num(DEFAULT_PIPELINE_CONFIG.retry.backoffMs),
  RETRIEVAL_TIMEOUT_MS: num(DEFAULT_PIPELINE_CONFIG.timeouts.retrievalMs),
  GENERATION_TIMEOUT_MS: num(DEFAULT_PIPELINE_CONFIG.timeouts.generationMs)
});

export interface AppConfig {
  port: number;
  logLevel: string;
  dataDir: string;
  store: "file" | "sqlite";
  adminKey: string;
  knowledge: { file: string } | { url: string; apiKey?: string };
  llm: { apiKey: string; baseUrl?: string; model?: string };
  replyWebhookUrl?: string;
  googleChatToken?: string;
  rateLimit: { windowMs: number; max: number };
  pipeline: PipelineConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  const e = parsed.data;

  const dataDir = path.resolve(e.DATA_DIR);
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    dataDir,
    store: e.STORE,
    adminKey: e.ADMIN_KEY,
    knowledge: e.KNOWLEDGE_URL
      ? { url: e.KNOWLEDGE_URL, apiKey: e.KNOWLEDGE_API_KEY }
      : { file: path.resolve(e.KNOWLEDGE_FILE ?? path.join(dataDir, "knowledge.jsonl")) },
    llm: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL, model: e.OPENAI_MODEL },
    replyWebhookUrl: e.REPLY_WEBHOOK_URL,
    googleChatToken: e.GOOGLE_CHAT_TOKEN || undefined,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
    pipeline: parsePipelineConfig({
      piiThreshold: e.PII_THRESHOLD,
      approvalThreshold: e.APPROVAL_THRESHOLD,
      maxHistoryTurns: e.MAX_HISTORY_TURNS,
      retry: {
        generationAttempts: e.GENERATION_MAX_ATTEMPTS,
        updateAttempts: e.UPDATE_MAX_ATTEMPTS,
        backoffMs: e.RETRY_BACKOFF_MS
      },
      timeouts: { retrievalMs: e.RETRIEVAL_TIMEOUT_MS, generationMs: e.GENERATION_TIMEOUT_MS }
    })
  };
}
