import { nanoid } from "nanoid";
import { AuditEvent } from "../types/contracts.js";

export function makeAudit(args: {
  conversationId: string;
  type: string;
  actor?: string;
  payload?: Record<string, unknown>;
}): AuditEvent {
  return {
    id: nanoid(),
    conversationId: args.conversationId,
    type: args.type,
    actor: args.actor ?? "system",
    payload: args.payload ?? {},
    at: new Date().toISOString()
  };
}
