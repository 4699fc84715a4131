import { z } from "zod";
import { Passage } from "../types/contracts.js";
import { KnowledgeStore } from "../core/retriever.js";

const SearchResponse = z.object({
  passages: z.array(z.object({
    id: z.string(),
    title: z.string().default(""),
    content: z.string(),
    source: z.string().default(""),
    score: z.number(),
    updatedAt: z.string()
  }))
});

/** Search endpoint of the indexing system: POST {query, k} -> {passages}. */
export class HttpKnowledgeStore implements KnowledgeStore {
  name = "http-knowledge";

  constructor(private args: { url: string; apiKey?: string }) {}

  async query(text: string, k: number, signal?: AbortSignal): Promise<Passage[]> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.args.apiKey) headers.Authorization = `Bearer ${this.args.apiKey}`;

    const r = await fetch(this.args.url, {
      method: "POST",
      headers,
      body: JSON.stringify({ query: text, k }),
      signal
    });
    if (!r.ok) {
      throw new Error(`search failed (${r.status}): ${(await r.text()).slice(0, 200)}`);
    }
    return SearchResponse.parse(await r.json()).passages;
  }
}
