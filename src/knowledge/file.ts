import fs from "fs";
import { z } from "zod";
import { Passage } from "../types/contracts.js";
import { KnowledgeStore } from "../core/retriever.js";
import { terms } from "../core/normalize.js";

const DocumentLine = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string().min(1),
  source: z.string(),
  updatedAt: z.string().min(1)
});

type KnowledgeDocument = z.infer<typeof DocumentLine> & { terms: string[] };

/**
 * Passages from a JSONL export of the knowledge base, scored by the share of
 * query terms a document contains.
 */
export class FileKnowledgeStore implements KnowledgeStore {
  name = "file-knowledge";
  private docs: KnowledgeDocument[] = [];

  constructor(private filePath: string) {}

  load(): number {
    const lines = fs.readFileSync(this.filePath, "utf8").split("\n").filter(l => l.trim());
    this.docs = lines.map((line, i) => {
      const parsed = DocumentLine.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`${this.filePath}:${i + 1}: ${parsed.error.issues[0]?.message ?? "invalid document"}`);
      }
      return { ...parsed.data, terms: terms(`${parsed.data.title} ${parsed.data.content}`) };
    });
    return this.docs.length;
  }

  async query(text: string, k: number, signal?: AbortSignal): Promise<Passage[]> {
    signal?.throwIfAborted();
    const wanted = terms(text);
    if (wanted.length === 0) return [];

    const scored: Passage[] = [];
    for (const doc of this.docs) {
      const hits = wanted.filter(t => doc.terms.includes(t)).length;
      if (hits === 0) continue;
      scored.push({
        id: doc.id,
        title: doc.title,
        content: doc.content,
        source: doc.source,
        score: hits / wanted.length,
        updatedAt: doc.updatedAt
      });
    }
    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }
}
