import { Router } from "express";
import { z } from "zod";
import type { Orchestrator } from "../plugin/createOrchestrator.js";
import { googleChatToEvent } from "../adapters/google-chat.js";
import { makeRateLimiter } from "./rate-limit.js";
import { wrap } from "./error-handler.js";

export const PENDING_NOTICE = "Thanks, an adviser is looking at this and will reply here shortly.";

const Verification = z.object({ token: z.string().optional() }).passthrough();

export function makeAdapterRoutes(args: {
  orchestrator: Orchestrator;
  rateLimit: { windowMs: number; max: number };
  googleChatToken?: string;
}) {
  const r = Router();

  // Global rate-limit for adapters
  r.use(makeRateLimiter(args.rateLimit));

  // --- Google Chat app events (JSON) ---
  r.post("/google-chat", wrap(async (req, res) => {
    if (args.googleChatToken) {
      const v = Verification.safeParse(req.body);
      if (!v.success || v.data.token !== args.googleChatToken) {
        res.status(401).json({ ok: false, error: "invalid_chat_token" });
        return;
      }
    }

    const ev = googleChatToEvent(req.body);
    if (ev.kind === "decision") {
      await args.orchestrator.handleSupervisorDecision(ev.event);
      res.json({ text: `Case ${ev.event.caseId} ${ev.event.decision}.` });
      return;
    }

    const out = await args.orchestrator.handleInboundMessage(ev.event);
    // Google Chat posts the synchronous response body into the thread
    res.json({ text: out.status === "sent" ? out.reply : PENDING_NOTICE });
  }));

  return r;
}
