import fs from "fs";
import path from "path";
import { ConversationStore, PutResult } from "./store.js";
import { AuditEvent, CaseStatus, Conversation, ConversationState, SupervisionCase } from "../types/contracts.js";

type Index = {
  conversations: Map<string, Conversation>;
  cases: Map<string, SupervisionCase>;
  auditByConversation: Map<string, AuditEvent[]>;
};

function safeJsonParse<T>(s: string): T | null {
  try {
    return JSON.parse(s) as T;
  } catch {
    return null;
  }
}

/**
 * Append-only JSONL files with an in-memory index. Every conversation or case
 * write appends the full record; the last line for an id wins on load.
 * Conditional writes are check-and-append within one tick, so they are safe
 * for a single process only; use SqliteStore when several processes share data.
 */
export class FileStore implements ConversationStore {
  private dir: string;
  private conversationsPath: string;
  private casesPath: string;
  private auditPath: string;
  skippedLines = 0;

  private idx: Index = {
    conversations: new Map(),
    cases: new Map(),
    auditByConversation: new Map()
  };

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.conversationsPath = path.join(this.dir, "conversations.jsonl");
    this.casesPath = path.join(this.dir, "cases.jsonl");
    this.auditPath = path.join(this.dir, "audit.jsonl");
  }

  async init(): Promise<void> {
    fs.mkdirSync(this.dir, { recursive: true });
    for (const p of [this.conversationsPath, this.casesPath, this.auditPath]) {
      if (!fs.existsSync(p)) fs.writeFileSync(p, "", "utf8");
    }
    for (const c of this.readLines<Conversation>(this.conversationsPath)) {
      this.idx.conversations.set(c.id, c);
    }
    for (const c of this.readLines<SupervisionCase>(this.casesPath)) {
      this.idx.cases.set(c.id, c);
    }
    for (const ev of this.readLines<AuditEvent>(this.auditPath)) {
      this.pushAudit(ev);
    }
  }

  private readLines<T>(filePath: string): T[] {
    const lines = fs.readFileSync(filePath, "utf8").split("\n").filter(Boolean);
    const out: T[] = [];
    for (const line of lines) {
      const v = safeJsonParse<T>(line);
      if (v) out.push(v);
      else this.skippedLines++;
    }
    return out;
  }

  private appendLine(filePath: string, obj: unknown) {
    fs.appendFileSync(filePath, JSON.stringify(obj) + "\n", "utf8");
  }

  private pushAudit(ev: AuditEvent) {
    const arr = this.idx.auditByConversation.get(ev.conversationId) ?? [];
    arr.push(ev);
    this.idx.auditByConversation.set(ev.conversationId, arr);
  }

  async getConversation(id: string): Promise<Conversation | null> {
    return this.idx.conversations.get(id) ?? null;
  }

  async putConversation(conversation: Conversation, expectedVersion: number): Promise<PutResult> {
    const current = this.idx.conversations.get(conversation.id);
    if ((current?.version ?? 0) !== expectedVersion) return { ok: false, conflict: true };

    const stored: Conversation = { ...conversation, version: expectedVersion + 1 };
    this.appendLine(this.conversationsPath, stored);
    this.idx.conversations.set(stored.id, stored);
    return { ok: true, version: stored.version };
  }

  async listConversations(q: { state?: ConversationState; limit?: number; offset?: number }): Promise<Conversation[]> {
    const limit = Math.min(q.limit ?? 50, 200);
    const offset = q.offset ?? 0;
    return [...this.idx.conversations.values()]
      .filter(c => !q.state || c.state === q.state)
      .sort((a, b) => b.lastActivityAt.localeCompare(a.lastActivityAt))
      .slice(offset, offset + limit);
  }

  async createCase(c: SupervisionCase): Promise<void> {
    this.appendLine(this.casesPath, c);
    this.idx.cases.set(c.id, c);
  }

  async getCase(id: string): Promise<SupervisionCase | null> {
    return this.idx.cases.get(id) ?? null;
  }

  async findCase(conversationId: string, messageSeq: number): Promise<SupervisionCase | null> {
    for (const c of this.idx.cases.values()) {
      if (c.conversationId === conversationId && c.messageSeq === messageSeq) return c;
    }
    return null;
  }

  async updateCase(c: SupervisionCase, expectedStatus: CaseStatus): Promise<boolean> {
    const current = this.idx.cases.get(c.id);
    if (!current || current.status !== expectedStatus) return false;
    this.appendLine(this.casesPath, c);
    this.idx.cases.set(c.id, c);
    return true;
  }

  async listCases(q: { status?: CaseStatus; conversationId?: string; limit?: number; offset?: number }): Promise<SupervisionCase[]> {
    const limit = Math.min(q.limit ?? 50, 200);
    const offset = q.offset ?? 0;
    return [...this.idx.cases.values()]
      .filter(c => (!q.status || c.status === q.status) && (!q.conversationId || c.conversationId === q.conversationId))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(offset, offset + limit);
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    this.appendLine(this.auditPath, ev);
    this.pushAudit(ev);
  }

  async listAudit(conversationId: string, limit: number = 200): Promise<AuditEvent[]> {
    const arr = this.idx.auditByConversation.get(conversationId) ?? [];
    return arr.slice(Math.max(0, arr.length - Math.min(limit, 1000)));
  }
}
