import fs from "fs";
import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { createOrchestrator } from "./plugin/createOrchestrator.js";
import { createRetriever, type KnowledgeStore } from "./core/retriever.js";
import { createResponder } from "./core/responder.js";
import { createOpenAICapability } from "./llm/openai.js";
import { FileKnowledgeStore } from "./knowledge/file.js";
import { HttpKnowledgeStore } from "./knowledge/http.js";
import { createLogNotifier, createWebhookNotifier } from "./outbound/notifier.js";
import { FileStore } from "./store/file.js";
import { SqliteStore } from "./store/sqlite.js";
import type { ConversationStore } from "./store/store.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

fs.mkdirSync(config.dataDir, { recursive: true });
const store: ConversationStore = config.store === "sqlite"
  ? new SqliteStore(path.join(config.dataDir, "conversations.sqlite"))
  : new FileStore(config.dataDir);

async function openKnowledge(): Promise<KnowledgeStore> {
  if ("url" in config.knowledge) {
    return new HttpKnowledgeStore({ url: config.knowledge.url, apiKey: config.knowledge.apiKey });
  }
  const knowledge = new FileKnowledgeStore(config.knowledge.file);
  if (fs.existsSync(config.knowledge.file)) {
    const count = knowledge.load();
    log.info({ file: config.knowledge.file, count }, "knowledge: loaded");
  } else {
    log.warn({ file: config.knowledge.file }, "knowledge: file missing, answering without passages");
  }
  return knowledge;
}

async function main() {
  await store.init();
  const knowledge = await openKnowledge();

  if (!config.llm.apiKey && !config.llm.baseUrl) {
    log.warn("OPENAI_API_KEY is not set; every turn will escalate to a supervisor");
  }
  const llm = createOpenAICapability({
    apiKey: config.llm.apiKey || "unset",
    baseUrl: config.llm.baseUrl,
    model: config.llm.model
  });

  const orchestrator = createOrchestrator({
    store,
    retriever: createRetriever(knowledge, { timeoutMs: config.pipeline.timeouts.retrievalMs }),
    responder: createResponder({
      llm,
      maxHistoryTurns: config.pipeline.maxHistoryTurns,
      timeoutMs: config.pipeline.timeouts.generationMs
    }),
    notifier: config.replyWebhookUrl
      ? createWebhookNotifier({ url: config.replyWebhookUrl, log })
      : createLogNotifier(log),
    config: config.pipeline,
    logger: log
  });

  const app = createApp({
    orchestrator,
    log,
    adminKey: config.adminKey,
    rateLimit: config.rateLimit,
    googleChatToken: config.googleChatToken
  });

  app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DATA_DIR: config.dataDir,
        STORE: config.store,
        KNOWLEDGE: "url" in config.knowledge ? "http" : "file",
        LLM_MODEL: config.llm.model ?? "default",
        ADMIN_KEY_CONFIGURED: Boolean(config.adminKey),
        REPLY_WEBHOOK_CONFIGURED: Boolean(config.replyWebhookUrl)
      },
      "support relay running"
    );
  });
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
