import { Passage } from "../types/contracts.js";
import { RetrievalUnavailable, getErrorMessage } from "./errors.js";
import { withTimeout } from "./stage.js";

/**
 * External content store, owned by the indexing system.
 * Implementations honour the signal so a timed-out query stops early.
 */
export interface KnowledgeStore {
  name: string;
  query(text: string, k: number, signal?: AbortSignal): Promise<Passage[]>;
}

export function rankPassages(passages: Passage[]): Passage[] {
  return [...passages].sort((a, b) => b.score - a.score || b.updatedAt.localeCompare(a.updatedAt));
}

export function createRetriever(store: KnowledgeStore, opts: { timeoutMs: number }) {
  async function retrieve(query: string, k: number): Promise<Passage[]> {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`k must be a non-negative integer, got ${k}`);
    }
    if (k === 0) return [];

    let found: Passage[];
    try {
      found = await withTimeout("retrieval", opts.timeoutMs, (signal) => store.query(query, k, signal));
    } catch (e) {
      throw new RetrievalUnavailable(`${store.name}: ${getErrorMessage(e)}`, { cause: e });
    }
    return rankPassages(found).slice(0, k);
  }

  return { retrieve };
}

export type Retriever = ReturnType<typeof createRetriever>;
