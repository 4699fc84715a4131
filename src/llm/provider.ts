/**
 * LLM capability seen by the responder.
 *
 * The capability answers with the reply text and a confidence in [0,1];
 * how it arrives at the confidence (self-reported or heuristic) is its own
 * business. Failures are plain rejections; the responder classifies them.
 */

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface Generation {
  text: string;
  confidence: number;
}

export interface LLMCapability {
  /** Human-readable name for logs */
  name: string;
  generate(prompt: LLMMessage[], signal?: AbortSignal): Promise<Generation>;
}
