/**
 * The responder turns conversation history plus retrieved passages into a
 * draft reply.
 *
 * Flow:
 *   1. Build the system prompt around the passages
 *   2. Take the most recent turns, dropping the oldest past the size budget
 *   3. Call the LLM under the generation timeout
 *   4. Clean the answer: cut role-played turns, pull out citations, clamp confidence
 */

import type { DraftResponse, Message, Passage } from "../types/contracts.js";
import type { Generation, LLMCapability, LLMMessage } from "../llm/provider.js";
import { GenerationError, getErrorMessage } from "./errors.js";
import { withTimeout } from "./stage.js";
import { NO_DOCUMENTS, SYSTEM_TEMPLATE } from "../presets/prompt.v1.js";

export const MAX_PROMPT_CHARS = 12_000;

export interface ResponderConfig {
  llm: LLMCapability;
  maxHistoryTurns: number;
  timeoutMs: number;
  maxPromptChars?: number;
}

export function createResponder(config: ResponderConfig) {
  const budget = config.maxPromptChars ?? MAX_PROMPT_CHARS;

  async function draft(history: Message[], passages: Passage[]): Promise<DraftResponse> {
    const prompt = buildPrompt(history, passages, config.maxHistoryTurns, budget);

    let generated: Generation;
    try {
      generated = await withTimeout("generation", config.timeoutMs, (signal) => config.llm.generate(prompt, signal));
    } catch (e) {
      throw new GenerationError(`${config.llm.name}: ${getErrorMessage(e)}`, { cause: e });
    }

    const { text, citations } = extractCitations(cutRolePlay(generated.text), passages);
    if (!text) {
      throw new GenerationError(`${config.llm.name}: empty answer`);
    }

    return { text, confidence: clampConfidence(generated.confidence), citations };
  }

  return { draft };
}

export type Responder = ReturnType<typeof createResponder>;

export function buildSystemPrompt(passages: Passage[]): string {
  const documents = passages.length
    ? passages.map(p => `<document id="${p.id}" source="${p.source}">\n${p.title}\n${p.content}\n</document>`).join("\n")
    : NO_DOCUMENTS;
  return SYSTEM_TEMPLATE.replace("{documents}", documents);
}

export function toLLMMessage(m: Message): LLMMessage {
  if (m.role === "user") return { role: "user", content: m.redactedText ?? m.text };
  return { role: "assistant", content: m.text };
}

/**
 * System prompt first, then at most maxTurns recent messages. Oldest turns go
 * first when over budget; the latest turn and the passages always stay.
 */
export function buildPrompt(history: Message[], passages: Passage[], maxTurns: number, budget: number): LLMMessage[] {
  const system: LLMMessage = { role: "system", content: buildSystemPrompt(passages) };
  const turns = history.slice(-Math.max(1, maxTurns)).map(toLLMMessage);

  let size = system.content.length + turns.reduce((n, t) => n + t.content.length, 0);
  while (size > budget && turns.length > 1) {
    const dropped = turns.shift();
    size -= dropped ? dropped.content.length : 0;
  }

  return [system, ...turns];
}

const OWN_LABEL = /^\s*(?:Assistant|Adviser|Advisor):\s*/;
const ROLE_PLAY = /(?:^|\s)(?:User|Customer|Supervisor|Adviser|Advisor|Assistant):\s/g;

/**
 * Models sometimes carry on the dialogue themselves; keep only their own turn.
 * A leading label on that turn is dropped, not treated as the next speaker.
 */
export function cutRolePlay(text: string): string {
  const own = text.replace(OWN_LABEL, "");
  for (const m of own.matchAll(ROLE_PLAY)) {
    if ((m.index ?? 0) > 0) return own.slice(0, m.index).trim();
  }
  return own.trim();
}

export function extractCitations(text: string, passages: Passage[]): { text: string; citations: string[] } {
  const known = new Set(passages.map(p => p.id));
  const citations: string[] = [];

  for (const m of text.matchAll(/<ref>\s*(.*?)\s*<\/ref>/g)) {
    const id = m[1];
    if (id && known.has(id) && !citations.includes(id)) citations.push(id);
  }

  const stripped = text.replace(/\s*<ref>.*?<\/ref>/g, "").trim();
  return { text: stripped, citations };
}

export function clampConfidence(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}
