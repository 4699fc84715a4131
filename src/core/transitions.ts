import { Conversation, ConversationState } from "../types/contracts.js";
import { InvalidStateError } from "./errors.js";

const allowed: Record<ConversationState, ConversationState[]> = {
  idle: ["processing"],
  processing: ["idle", "awaiting_supervision"],
  awaiting_supervision: ["processing", "idle"]
};

export function canTransition(from: ConversationState, to: ConversationState): boolean {
  return allowed[from].includes(to);
}

/** processing while a turn runs, then awaiting_supervision while cases are open, else idle */
export function deriveState(c: Pick<Conversation, "activeTurns" | "pendingCaseIds">): ConversationState {
  if (c.activeTurns.length > 0) return "processing";
  if (c.pendingCaseIds.length > 0) return "awaiting_supervision";
  return "idle";
}

/** Re-derives the state, rejecting a change the state machine does not allow. */
export function settle(c: Conversation): Conversation {
  const next = deriveState(c);
  if (next === c.state) return c;
  if (!canTransition(c.state, next)) {
    throw new InvalidStateError(`conversation ${c.id}: ${c.state} -> ${next} is not allowed`);
  }
  return { ...c, state: next };
}
