import { nanoid } from "nanoid";
import {
  Decision,
  DraftResponse,
  EscalationReason,
  PIIFinding,
  Role,
  SupervisionCase,
  SupervisorDecisionEvent
} from "../types/contracts.js";
import { InvalidStateError, ValidationError } from "./errors.js";
import { hasEscalatingFinding } from "./pii.js";
import { REJECTION_FALLBACK } from "../presets/prompt.v1.js";

export interface GateThresholds {
  piiThreshold: number;
  approvalThreshold: number;
}

export type GateResult =
  | { kind: "auto" }
  | { kind: "escalate"; reasons: EscalationReason[] };

/**
 * Automatic send only when nothing is flagged at or above the PII threshold,
 * the draft is confident enough, and no supervisor has the conversation.
 * A missing draft (generation failed) always escalates.
 */
export function evaluate(
  args: { findings: PIIFinding[]; draft: DraftResponse | null; overrideActive: boolean },
  t: GateThresholds
): GateResult {
  const reasons: EscalationReason[] = [];
  if (hasEscalatingFinding(args.findings, t.piiThreshold)) reasons.push("pii");
  if (!args.draft) reasons.push("pipeline_error");
  else if (args.draft.confidence < t.approvalThreshold) reasons.push("low_confidence");
  if (args.overrideActive) reasons.push("supervisor_override");

  return reasons.length === 0 ? { kind: "auto" } : { kind: "escalate", reasons };
}

export function openCase(args: {
  conversationId: string;
  messageSeq: number;
  draft: DraftResponse | null;
  reasons: EscalationReason[];
}): SupervisionCase {
  return {
    id: nanoid(),
    conversationId: args.conversationId,
    messageSeq: args.messageSeq,
    draft: args.draft,
    reasons: args.reasons,
    status: "pending",
    supervisorId: null,
    resolutionText: null,
    createdAt: new Date().toISOString(),
    resolvedAt: null
  };
}

export interface Resolution {
  resolved: SupervisionCase;
  outbound: { role: Role; text: string };
}

function outboundFor(c: SupervisionCase, decision: Decision, text?: string): Resolution["outbound"] {
  switch (decision) {
    case "approved":
      if (!c.draft) throw new ValidationError(`case ${c.id} has no draft to approve; edit or reject it`);
      return { role: "bot", text: c.draft.text };
    case "edited":
      if (!text?.trim()) throw new ValidationError("an edited decision needs the replacement text");
      return { role: "supervisor", text: text.trim() };
    case "rejected":
      return { role: "bot", text: REJECTION_FALLBACK };
  }
}

export function resolveCase(c: SupervisionCase, ev: SupervisorDecisionEvent): Resolution {
  if (c.status !== "pending") {
    throw new InvalidStateError(`case ${c.id} is already ${c.status}`);
  }
  const outbound = outboundFor(c, ev.decision, ev.text);
  // a rejection still keeps the supervisor's note, though the user gets the fallback
  const note = ev.text?.trim() || null;
  return {
    resolved: {
      ...c,
      status: ev.decision,
      supervisorId: ev.supervisorId,
      resolutionText: ev.decision === "edited" ? outbound.text : note,
      resolvedAt: new Date().toISOString()
    },
    outbound
  };
}

/** The reply a resolved case stands for, rebuilt from what was stored. */
export function outboundOf(c: SupervisionCase): Resolution["outbound"] {
  if (c.status === "pending") {
    throw new InvalidStateError(`case ${c.id} is still pending`);
  }
  return outboundFor(c, c.status, c.resolutionText ?? undefined);
}
