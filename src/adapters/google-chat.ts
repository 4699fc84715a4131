import { z } from "zod";
import type { InboundEvent, SupervisorDecisionEvent } from "../types/contracts.js";
import { ValidationError } from "../core/errors.js";

/**
 * Google Chat app events. We only need:
 * - MESSAGE: space, thread, text (argumentText has the bot mention removed)
 * - CARD_CLICKED: the supervisor's button press on a case card
 */
const ChatUser = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  email: z.string().optional()
}).passthrough();

const MessageEvent = z.object({
  type: z.literal("MESSAGE"),
  eventTime: z.string().optional(),
  space: z.object({ name: z.string() }).passthrough(),
  user: ChatUser.optional(),
  message: z.object({
    name: z.string().optional(),
    text: z.string().optional(),
    argumentText: z.string().optional(),
    createTime: z.string().optional(),
    thread: z.object({ name: z.string() }).passthrough().optional()
  }).passthrough()
}).passthrough();

const ActionParameter = z.object({ key: z.string(), value: z.string() });

const CardClickedEvent = z.object({
  type: z.literal("CARD_CLICKED"),
  user: ChatUser,
  action: z.object({
    actionMethodName: z.string(),
    parameters: z.array(ActionParameter).default([])
  }).passthrough(),
  common: z.object({
    formInputs: z.record(z.object({
      stringInputs: z.object({ value: z.array(z.string()) }).optional()
    }).passthrough()).optional()
  }).passthrough().optional()
}).passthrough();

const ChatEvent = z.discriminatedUnion("type", [MessageEvent, CardClickedEvent]);

export type GoogleChatEvent =
  | { kind: "message"; event: InboundEvent }
  | { kind: "decision"; event: SupervisorDecisionEvent };

const ACTIONS: Record<string, SupervisorDecisionEvent["decision"]> = {
  approve: "approved",
  edit: "edited",
  reject: "rejected"
};

/** "spaces/AAA" -> "AAA"; "spaces/AAA/threads/TTT" -> "TTT" */
function lastSegment(name: string): string {
  const parts = name.split("/");
  return parts[parts.length - 1] ?? name;
}

export function stripMention(text: string): string {
  return text.replace(/^\s*@\S+\s*/, "").trim();
}

export function googleChatConversationId(spaceName: string, threadName?: string): string {
  const thread = threadName ? lastSegment(threadName) : "main";
  return `gchat:${lastSegment(spaceName)}:${thread}`;
}

export function googleChatToEvent(body: unknown): GoogleChatEvent {
  const parsed = ChatEvent.safeParse(body);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error);
  const p = parsed.data;

  if (p.type === "MESSAGE") {
    const text = p.message.argumentText?.trim() || stripMention(p.message.text ?? "");
    return {
      kind: "message",
      event: {
        conversationId: googleChatConversationId(p.space.name, p.message.thread?.name),
        channel: "google_chat",
        role: "user",
        text,
        timestamp: p.message.createTime ?? p.eventTime ?? new Date().toISOString()
      }
    };
  }

  const decision = ACTIONS[p.action.actionMethodName];
  if (!decision) throw new ValidationError(`unknown card action: ${p.action.actionMethodName}`);

  const params = new Map(p.action.parameters.map(x => [x.key, x.value]));
  const caseId = params.get("caseId");
  if (!caseId) throw new ValidationError("card action is missing the caseId parameter");

  const edited = p.common?.formInputs?.["text"]?.stringInputs?.value[0] ?? params.get("text");
  return {
    kind: "decision",
    event: {
      caseId,
      decision,
      supervisorId: p.user.email ?? p.user.name,
      text: edited
    }
  };
}
