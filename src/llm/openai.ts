import OpenAI from "openai";
import { z } from "zod";
import type { Generation, LLMCapability, LLMMessage } from "./provider.js";

const DEFAULTS = {
  model: "gpt-4o-mini",
  maxTokens: 800,
  temperature: 0.2
};

const AnswerContract = z.object({
  answer: z.string(),
  confidence: z.coerce.number()
});

export interface OpenAICapabilityConfig {
  apiKey: string;
  /** Any OpenAI-compatible endpoint, e.g. a local Ollama at http://localhost:11434/v1 */
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Chat completions in JSON mode. The system prompt asks for
 * {"answer": string, "confidence": number}; anything else is a failure.
 */
export function createOpenAICapability(config: OpenAICapabilityConfig, client?: OpenAI): LLMCapability {
  const model = config.model ?? DEFAULTS.model;
  const openai = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });

  return {
    name: `openai/${model}`,

    async generate(prompt: LLMMessage[], signal?: AbortSignal): Promise<Generation> {
      const completion = await openai.chat.completions.create(
        {
          model,
          messages: prompt.map(toChatMessage),
          max_tokens: config.maxTokens ?? DEFAULTS.maxTokens,
          temperature: config.temperature ?? DEFAULTS.temperature,
          response_format: { type: "json_object" }
        },
        { signal }
      );

      const content = completion.choices[0]?.message?.content;
      if (!content) throw new Error(`${model} returned no content`);

      const parsed = AnswerContract.parse(JSON.parse(content));
      return { text: parsed.answer, confidence: parsed.confidence };
    }
  };
}

function toChatMessage(m: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    case "user":
      return { role: "user", content: m.content };
  }
}
