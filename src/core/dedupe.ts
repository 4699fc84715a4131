import crypto from "crypto";
import { normalizeText } from "./normalize.js";

/** Identifies a redelivered inbound event: same conversation, send time and text. */
export function fingerprintOf(args: {
  conversationId: string;
  timestamp: string;
  text: string;
}): string {
  const raw = `${args.conversationId}|${args.timestamp}|${normalizeText(args.text)}`;
  return crypto.createHash("sha256").update(raw).digest("hex");
}
