import type { Logger } from "pino";
import type { Channel, Role } from "../types/contracts.js";
import { withTimeout } from "../core/stage.js";

export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;

export interface OutboundReply {
  conversationId: string;
  channel: Channel;
  role: Role;
  text: string;
  caseId: string;
}

/** Delivers replies that are produced outside the inbound request, i.e. by supervisor decisions. */
export interface ReplyNotifier {
  deliver(reply: OutboundReply): Promise<void>;
}

export function createLogNotifier(log: Logger): ReplyNotifier {
  return {
    async deliver(reply) {
      log.info({ conversationId: reply.conversationId, channel: reply.channel, caseId: reply.caseId }, "reply: delivered to log");
    }
  };
}

export function createWebhookNotifier(args: { url: string; log: Logger; timeoutMs?: number }): ReplyNotifier {
  const timeoutMs = args.timeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
  return {
    async deliver(reply) {
      const r = await withTimeout("delivery", timeoutMs, (signal) =>
        fetch(args.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(reply),
          signal
        })
      );
      if (!r.ok) {
        throw new Error(`reply webhook failed (${r.status}): ${(await r.text()).slice(0, 200)}`);
      }
      args.log.info({ conversationId: reply.conversationId, caseId: reply.caseId, status: r.status }, "reply: delivered to webhook");
    }
  };
}
