import { Router } from "express";
import { z } from "zod";
import type { Orchestrator } from "../plugin/createOrchestrator.js";
import { requireAdminKey } from "./admin-key.js";
import { makeRateLimiter } from "./rate-limit.js";
import { wrap } from "./error-handler.js";

const CaseStatusQuery = z.enum(["pending", "approved", "edited", "rejected"]);
const StateQuery = z.enum(["idle", "processing", "awaiting_supervision"]);

export function makeRoutes(args: {
  orchestrator: Orchestrator;
  adminKey: string;
  rateLimit: { windowMs: number; max: number };
}) {
  const r = Router();
  const { orchestrator } = args;
  const admin = requireAdminKey(args.adminKey);

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // Inbound user message: InboundEvent contract in the body
  r.post("/messages", makeRateLimiter(args.rateLimit), wrap(async (req, res) => {
    const out = await orchestrator.handleInboundMessage(req.body);
    res.json({ ok: true, ...out });
  }));

  r.get("/conversations", admin, wrap(async (req, res) => {
    const state = req.query.state ? StateQuery.parse(req.query.state) : undefined;
    const limit = req.query.limit
      ? z.coerce.number().int().min(1).max(200).parse(req.query.limit)
      : 50;
    const offset = req.query.offset
      ? z.coerce.number().int().min(0).parse(req.query.offset)
      : 0;

    const conversations = await orchestrator.listConversations({ state, limit, offset });
    res.json({ ok: true, conversations });
  }));

  r.get("/conversations/:id", admin, wrap(async (req, res) => {
    const conversation = await orchestrator.getConversation(req.params.id);
    res.json({ ok: true, conversation });
  }));

  r.get("/conversations/:id/events", admin, wrap(async (req, res) => {
    const limit = req.query.limit
      ? z.coerce.number().int().min(1).max(1000).parse(req.query.limit)
      : 200;
    const events = await orchestrator.listAudit(req.params.id, limit);
    res.json({ ok: true, events });
  }));

  r.get("/cases", admin, wrap(async (req, res) => {
    const status = req.query.status ? CaseStatusQuery.parse(req.query.status) : undefined;
    const conversationId = req.query.conversationId
      ? z.string().min(1).parse(req.query.conversationId)
      : undefined;
    const limit = req.query.limit
      ? z.coerce.number().int().min(1).max(200).parse(req.query.limit)
      : 50;
    const offset = req.query.offset
      ? z.coerce.number().int().min(0).parse(req.query.offset)
      : 0;

    const cases = await orchestrator.listCases({ status, conversationId, limit, offset });
    res.json({ ok: true, cases });
  }));

  r.post("/cases/:id/decision", admin, wrap(async (req, res) => {
    const body: unknown = req.body;
    const out = await orchestrator.handleSupervisorDecision({
      ...(typeof body === "object" && body !== null ? body : {}),
      caseId: req.params.id
    });
    res.json({ ok: true, ...out });
  }));

  return r;
}
