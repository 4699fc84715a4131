import { z } from "zod";
import pino, { type Logger } from "pino";
import type {
  Conversation,
  ConversationState,
  DraftResponse,
  InboundEvent,
  InboundResult,
  Message,
  PIIFinding,
  Passage,
  SupervisionCase,
  CaseStatus,
  AuditEvent,
  SupervisorDecisionEvent
} from "../types/contracts.js";
import type { ConversationStore } from "../store/store.js";
import type { Retriever } from "../core/retriever.js";
import type { Responder } from "../core/responder.js";
import type { ReplyNotifier } from "../outbound/notifier.js";
import type { PipelineConfig } from "../config.js";
import { makeAudit } from "../audit/audit.js";
import { fingerprintOf } from "../core/dedupe.js";
import { redact, scan } from "../core/pii.js";
import { evaluate, openCase, outboundOf, resolveCase, type GateResult, type Resolution } from "../core/supervision.js";
import { settle } from "../core/transitions.js";
import { withRetry } from "../core/stage.js";
import { presetId as piiPresetId } from "../presets/pii.v1.js";
import { promptId } from "../presets/prompt.v1.js";
import {
  ConcurrentUpdateError,
  InvalidStateError,
  NotFoundError,
  PipelineError,
  ValidationError,
  getErrorMessage
} from "../core/errors.js";

export const DEFAULT_PASSAGES = 5;

const InboundSchema = z.object({
  conversationId: z.string().trim().min(1),
  channel: z.enum(["web", "google_chat", "slack", "api"]),
  role: z.literal("user"),
  text: z.string().refine(s => s.trim().length > 0, "text must not be empty"),
  timestamp: z.string().datetime({ offset: true })
});

const DecisionSchema = z.object({
  caseId: z.string().min(1),
  decision: z.enum(["approved", "edited", "rejected"]),
  supervisorId: z.string().min(1),
  text: z.string().optional()
});

export interface OrchestratorDeps {
  store: ConversationStore;
  retriever: Retriever;
  responder: Responder;
  notifier: ReplyNotifier;
  config: PipelineConfig;
  logger?: Logger;
  passagesPerQuery?: number;
}

function newConversation(ev: InboundEvent, now: string): Conversation {
  return {
    id: ev.conversationId,
    channel: ev.channel,
    messages: [],
    state: "idle",
    activeTurns: [],
    pendingCaseIds: [],
    supervisorOverride: false,
    version: 0,
    createdAt: now,
    lastActivityAt: now
  };
}

/** Appends with the next sequence number; `at` never goes backwards. */
function append(c: Conversation, m: Omit<Message, "seq" | "at">): { conversation: Conversation; message: Message } {
  const last = c.messages[c.messages.length - 1];
  const now = new Date().toISOString();
  const message: Message = {
    ...m,
    seq: (last?.seq ?? 0) + 1,
    at: last && last.at > now ? last.at : now
  };
  return {
    conversation: { ...c, messages: [...c.messages, message], lastActivityAt: message.at },
    message
  };
}

function endTurn(c: Conversation, seq: number): Conversation {
  return { ...c, activeTurns: c.activeTurns.filter(s => s !== seq) };
}

function overrideActive(c: Conversation | null): boolean {
  return !!c && (c.supervisorOverride || c.pendingCaseIds.length > 0);
}

function replyTo(c: Conversation | null, seq: number): Message | undefined {
  return c?.messages.find(m => m.inReplyTo === seq);
}

/** A stored user message without redacted text never passed the PII filter. */
function scanFailureOf(turn: Message): PipelineError | null {
  return turn.redactedText === null ? new PipelineError("pii", new Error(`message ${turn.seq} was stored unscanned`)) : null;
}

export function createOrchestrator(deps: OrchestratorDeps) {
  const { store, retriever, responder, notifier, config } = deps;
  const log = deps.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const k = deps.passagesPerQuery ?? DEFAULT_PASSAGES;

  /**
   * Read-modify-conditional-write. `change` returns null when nothing needs
   * writing. Conflicts reload and reapply, up to retry.updateAttempts.
   */
  async function mutate(
    id: string,
    change: (current: Conversation | null) => Conversation | null
  ): Promise<Conversation | null> {
    const attempts = config.retry.updateAttempts;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const current = await store.getConversation(id);
      const changed = change(current);
      if (!changed) return current;

      const next = settle(changed);
      const put = await store.putConversation(next, current?.version ?? 0);
      if (put.ok) return { ...next, version: put.version };
      log.debug({ conversationId: id, attempt }, "conversation: write conflict");
    }
    throw new ConcurrentUpdateError(id, attempts);
  }

  async function record(ev: AuditEvent) {
    try {
      await store.appendAudit(ev);
    } catch (e) {
      log.error({ err: e, conversationId: ev.conversationId, type: ev.type }, "audit: write failed");
    }
  }

  async function handleInboundMessage(raw: unknown): Promise<InboundResult> {
    const parsed = InboundSchema.safeParse(raw);
    if (!parsed.success) throw ValidationError.fromZod(parsed.error);
    const ev: InboundEvent = parsed.data;
    const clog = log.child({ conversationId: ev.conversationId });

    // PII first so the appended message is complete; it never changes afterwards.
    let findings: PIIFinding[] = [];
    let redactedText: string | null = null;
    let failure: PipelineError | null = null;
    try {
      findings = scan(ev.text);
      redactedText = redact(ev.text, findings);
    } catch (e) {
      failure = new PipelineError("pii", e);
      clog.warn({ err: e }, "pii: scan failed");
    }

    const fingerprint = fingerprintOf(ev);
    const seen: { duplicate?: Message; appended?: Message } = {};

    await mutate(ev.conversationId, (current) => {
      seen.duplicate = undefined;
      seen.appended = undefined;
      const conv = current ?? newConversation(ev, new Date().toISOString());
      if (conv.channel !== ev.channel) {
        throw new ValidationError(`conversation ${conv.id} belongs to channel ${conv.channel}, not ${ev.channel}`);
      }
      seen.duplicate = conv.messages.find(m => m.fingerprint === fingerprint);
      if (seen.duplicate) return null;

      const { conversation, message } = append(conv, {
        role: "user",
        text: ev.text,
        redactedText,
        findings,
        fingerprint
      });
      seen.appended = message;
      return { ...conversation, activeTurns: [...conv.activeTurns, message.seq] };
    });

    if (seen.duplicate) {
      clog.info({ seq: seen.duplicate.seq }, "inbound: redelivered event");
      return redelivered(ev.conversationId, seen.duplicate, clog);
    }
    const turn = seen.appended;
    if (!turn) {
      throw new InvalidStateError(`conversation ${ev.conversationId} was not opened`);
    }

    await record(makeAudit({
      conversationId: ev.conversationId,
      type: "message_received",
      payload: { seq: turn.seq, channel: ev.channel }
    }));
    if (findings.length > 0) {
      await record(makeAudit({
        conversationId: ev.conversationId,
        type: "pii_detected",
        payload: { seq: turn.seq, preset: piiPresetId, categories: findings.map(f => f.category), rules: findings.map(f => f.rule) }
      }));
    }

    return runTurn(ev.conversationId, turn, failure, clog);
  }

  /**
   * Answers a redelivered message from what is stored. A turn that was
   * interrupted after its message was appended is picked up again here.
   */
  async function redelivered(conversationId: string, original: Message, clog: Logger): Promise<InboundResult> {
    const conv = await store.getConversation(conversationId);
    const existing = await store.findCase(conversationId, original.seq);
    if (existing && (existing.status !== "pending" || conv?.pendingCaseIds.includes(existing.id))) {
      return { status: "pending" };
    }
    const reply = replyTo(conv, original.seq);
    if (reply) return { status: "sent", reply: reply.text };
    if (conv?.activeTurns.includes(original.seq)) return { status: "pending" };

    const claim = { won: false };
    const claimed = await mutate(conversationId, (current) => {
      claim.won = false;
      if (!current) throw new NotFoundError(`conversation ${conversationId}`);
      if (current.activeTurns.includes(original.seq) || replyTo(current, original.seq)) return null;
      claim.won = true;
      return { ...current, activeTurns: [...current.activeTurns, original.seq] };
    });
    if (!claim.won) {
      const late = replyTo(claimed, original.seq);
      return late ? { status: "sent", reply: late.text } : { status: "pending" };
    }

    clog.warn({ seq: original.seq, caseId: existing?.id ?? null }, "inbound: resuming an interrupted turn");
    await record(makeAudit({
      conversationId,
      type: "turn_resumed",
      payload: { seq: original.seq, caseId: existing?.id ?? null }
    }));

    if (existing) {
      try {
        await attachCase(conversationId, original.seq, existing.id);
      } catch (e) {
        await releaseTurn(conversationId, original.seq, clog);
        throw e;
      }
      return { status: "pending" };
    }
    return runTurn(conversationId, original, scanFailureOf(original), clog);
  }

  /** Retrieve, draft and conclude one turn; the turn is released if anything throws. */
  async function runTurn(
    conversationId: string,
    turn: Message,
    scanFailure: PipelineError | null,
    clog: Logger
  ): Promise<InboundResult> {
    try {
      let failure = scanFailure;
      let draft: DraftResponse | null = null;
      if (!failure) {
        const conv = await store.getConversation(conversationId);
        const history = (conv?.messages ?? [turn]).filter(m => m.seq <= turn.seq);
        const passages = await retrieve(conversationId, turn, clog);
        try {
          draft = await withRetry(
            { attempts: config.retry.generationAttempts, backoffMs: config.retry.backoffMs },
            () => responder.draft(history, passages),
            (e, attempt) => clog.warn({ err: e, attempt: attempt + 1 }, "generation: attempt failed")
          );
        } catch (e) {
          failure = new PipelineError("generation", e);
          clog.error({ err: e }, "generation: retries exhausted, escalating");
          await record(makeAudit({
            conversationId,
            type: "generation_failed",
            payload: { seq: turn.seq, error: getErrorMessage(e) }
          }));
        }
      }
      return await conclude(conversationId, turn, draft, failure, clog);
    } catch (e) {
      await releaseTurn(conversationId, turn.seq, clog);
      throw e;
    }
  }

  async function releaseTurn(conversationId: string, seq: number, clog: Logger) {
    try {
      await mutate(conversationId, (current) => (current?.activeTurns.includes(seq) ? endTurn(current, seq) : null));
    } catch (e) {
      clog.error({ err: e, seq }, "turn: could not release after a failure");
    }
  }

  async function retrieve(conversationId: string, turn: Message, clog: Logger): Promise<Passage[]> {
    try {
      return await retriever.retrieve(turn.redactedText ?? turn.text, k);
    } catch (e) {
      // degraded mode: answer without passages
      clog.warn({ err: e }, "retrieval: unavailable, continuing without passages");
      await record(makeAudit({
        conversationId,
        type: "retrieval_degraded",
        payload: { seq: turn.seq, error: getErrorMessage(e) }
      }));
      return [];
    }
  }

  /** Lists the case on the conversation and ends the turn; listing twice is a no-op. */
  async function attachCase(conversationId: string, seq: number, caseId: string) {
    await mutate(conversationId, (current) => {
      if (!current) throw new NotFoundError(`conversation ${conversationId}`);
      const pendingCaseIds = current.pendingCaseIds.includes(caseId)
        ? current.pendingCaseIds
        : [...current.pendingCaseIds, caseId];
      return endTurn({ ...current, pendingCaseIds }, seq);
    });
  }

  async function conclude(
    conversationId: string,
    turn: Message,
    draft: DraftResponse | null,
    failure: PipelineError | null,
    clog: Logger
  ): Promise<InboundResult> {
    const findings = turn.findings;
    const latest = await store.getConversation(conversationId);
    let gate: GateResult = evaluate({ findings, draft, overrideActive: overrideActive(latest) }, config);

    if (gate.kind === "auto" && draft) {
      const reply = draft;
      const race = { lost: false };
      await mutate(conversationId, (current) => {
        race.lost = false;
        if (!current) throw new NotFoundError(`conversation ${conversationId}`);
        if (overrideActive(current)) {
          race.lost = true;
          return null;
        }
        const { conversation } = append(current, {
          role: "bot",
          text: reply.text,
          redactedText: null,
          findings: [],
          inReplyTo: turn.seq
        });
        return endTurn(conversation, turn.seq);
      });

      if (!race.lost) {
        clog.info({ seq: turn.seq, confidence: reply.confidence }, "reply: sent automatically");
        await record(makeAudit({
          conversationId,
          type: "reply_sent",
          payload: { seq: turn.seq, prompt: promptId, confidence: reply.confidence, citations: reply.citations }
        }));
        return { status: "sent", reply: reply.text };
      }
      gate = evaluate({ findings, draft, overrideActive: true }, config);
    }

    const reasons = gate.kind === "escalate" ? gate.reasons : ["pipeline_error" as const];
    const supervisionCase = openCase({ conversationId, messageSeq: turn.seq, draft, reasons });
    await store.createCase(supervisionCase);
    await attachCase(conversationId, turn.seq, supervisionCase.id);

    clog.info({ seq: turn.seq, caseId: supervisionCase.id, reasons }, "reply: escalated to supervision");
    await record(makeAudit({
      conversationId,
      type: "escalated",
      payload: { seq: turn.seq, caseId: supervisionCase.id, reasons, failedStage: failure?.stage ?? null }
    }));
    return { status: "pending" };
  }

  /** Resolves a pending case, or picks up a resolved one whose reply never reached the conversation. */
  async function decide(current: SupervisionCase, ev: SupervisorDecisionEvent, clog: Logger): Promise<Resolution> {
    if (current.status === "pending") {
      const resolution = resolveCase(current, ev);
      const won = await store.updateCase(resolution.resolved, "pending");
      if (!won) throw new InvalidStateError(`case ${ev.caseId} was resolved concurrently`);
      return resolution;
    }

    const conv = await store.getConversation(current.conversationId);
    const unfinished = !!conv?.pendingCaseIds.includes(current.id);
    if (!unfinished || current.status !== ev.decision || current.supervisorId !== ev.supervisorId) {
      throw new InvalidStateError(`case ${ev.caseId} is already ${current.status}`);
    }
    clog.warn({ conversationId: current.conversationId }, "case: finishing a decision whose reply was not stored");
    return { resolved: current, outbound: outboundOf(current) };
  }

  /**
   * The case flips first; that conditional write picks the winner between
   * racing decisions. If the conversation write after it fails, the same
   * decision redelivered finishes it from the stored case.
   */
  async function handleSupervisorDecision(raw: unknown): Promise<{ status: "resolved" }> {
    const parsed = DecisionSchema.safeParse(raw);
    if (!parsed.success) throw ValidationError.fromZod(parsed.error);
    const ev = parsed.data;
    const clog = log.child({ caseId: ev.caseId });

    const current = await store.getCase(ev.caseId);
    if (!current) throw new NotFoundError(`case ${ev.caseId}`);

    const { resolved: settled, outbound } = await decide(current, ev, clog);

    const applied = { now: false };
    const conversation = await mutate(settled.conversationId, (conv) => {
      applied.now = false;
      if (!conv) throw new NotFoundError(`conversation ${settled.conversationId}`);
      if (!conv.pendingCaseIds.includes(settled.id)) return null;
      const { conversation: next } = append(conv, {
        role: outbound.role,
        text: outbound.text,
        redactedText: null,
        findings: [],
        inReplyTo: settled.messageSeq
      });
      applied.now = true;
      return {
        ...next,
        pendingCaseIds: conv.pendingCaseIds.filter(id => id !== settled.id),
        supervisorOverride: settled.status !== "approved"
      };
    });
    if (!conversation) throw new NotFoundError(`conversation ${settled.conversationId}`);
    if (!applied.now) {
      // a concurrent redelivery already stored the reply and delivered it
      return { status: "resolved" };
    }

    clog.info({ conversationId: conversation.id, decision: settled.status }, "case: resolved");
    await record(makeAudit({
      conversationId: conversation.id,
      type: "case_resolved",
      actor: ev.supervisorId,
      payload: { caseId: settled.id, decision: settled.status, seq: settled.messageSeq }
    }));

    try {
      await notifier.deliver({
        conversationId: conversation.id,
        channel: conversation.channel,
        role: outbound.role,
        text: outbound.text,
        caseId: settled.id
      });
    } catch (e) {
      // the decision stands; the failed delivery is left in the audit trail
      clog.error({ err: e, conversationId: conversation.id }, "reply: delivery failed");
      await record(makeAudit({
        conversationId: conversation.id,
        type: "delivery_failed",
        payload: { caseId: settled.id, error: getErrorMessage(e) }
      }));
    }

    return { status: "resolved" };
  }

  async function getConversation(id: string): Promise<Conversation> {
    const c = await store.getConversation(id);
    if (!c) throw new NotFoundError(`conversation ${id}`);
    return c;
  }

  async function listConversations(q: { state?: ConversationState; limit?: number; offset?: number }): Promise<Conversation[]> {
    return store.listConversations(q);
  }

  async function listCases(q: { status?: CaseStatus; conversationId?: string; limit?: number; offset?: number }): Promise<SupervisionCase[]> {
    return store.listCases(q);
  }

  async function listAudit(conversationId: string, limit?: number): Promise<AuditEvent[]> {
    await getConversation(conversationId);
    return store.listAudit(conversationId, limit);
  }

  return {
    handleInboundMessage,
    handleSupervisorDecision,
    getConversation,
    listConversations,
    listCases,
    listAudit
  };
}

export type Orchestrator = ReturnType<typeof createOrchestrator>;
