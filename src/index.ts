export { createOrchestrator } from "./plugin/createOrchestrator.js";
export type { Orchestrator, OrchestratorDeps } from "./plugin/createOrchestrator.js";
export { createApp } from "./app.js";
export { makeRoutes } from "./api/routes.js";
export { makeAdapterRoutes } from "./api/adapters.js";
export { createRetriever } from "./core/retriever.js";
export type { KnowledgeStore, Retriever } from "./core/retriever.js";
export { createResponder } from "./core/responder.js";
export type { Responder } from "./core/responder.js";
export { scan, redact } from "./core/pii.js";
export { evaluate } from "./core/supervision.js";
export * from "./core/errors.js";
export { loadConfig, parsePipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config.js";
export type { AppConfig, PipelineConfig } from "./config.js";
export { createOpenAICapability } from "./llm/openai.js";
export type { LLMCapability, LLMMessage, Generation } from "./llm/provider.js";
export { FileKnowledgeStore } from "./knowledge/file.js";
export { HttpKnowledgeStore } from "./knowledge/http.js";
export { createLogNotifier, createWebhookNotifier } from "./outbound/notifier.js";
export type { ReplyNotifier, OutboundReply } from "./outbound/notifier.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export type { ConversationStore, PutResult } from "./store/store.js";
export type {
  InboundEvent,
  InboundResult,
  SupervisorDecisionEvent,
  Conversation,
  Message,
  PIIFinding,
  Passage,
  DraftResponse,
  SupervisionCase,
  AuditEvent,
  Channel
} from "./types/contracts.js";
