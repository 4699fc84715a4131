import sqlite3 from "sqlite3";
import { ConversationStore, PutResult } from "./store.js";
import { AuditEvent, CaseStatus, Conversation, ConversationState, SupervisionCase } from "../types/contracts.js";

function run(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row as T | undefined)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: unknown[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(err) : resolve(rows as T[])));
  });
}

interface ConversationRow {
  id: string;
  channel: Conversation["channel"];
  state: ConversationState;
  activeTurnsJson: string;
  pendingCaseIdsJson: string;
  supervisorOverride: number;
  messagesJson: string;
  version: number;
  createdAt: string;
  lastActivityAt: string;
}

interface CaseRow {
  caseJson: string;
}

interface AuditRow {
  id: string;
  conversationId: string;
  type: string;
  actor: string;
  payloadJson: string;
  at: string;
}

export class SqliteStore implements ConversationStore {
  private db: sqlite3.Database;

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    if (this.dbPath !== ":memory:") await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `
      create table if not exists conversations (
        id text primary key,
        channel text not null,
        state text not null,
        activeTurnsJson text not null,
        pendingCaseIdsJson text not null,
        supervisorOverride integer not null,
        messagesJson text not null,
        version integer not null,
        createdAt text not null,
        lastActivityAt text not null
      );
    `);
    await run(this.db, `create index if not exists idx_conversations_state on conversations(state, lastActivityAt);`);

    await run(this.db, `
      create table if not exists cases (
        id text primary key,
        conversationId text not null,
        messageSeq integer not null,
        status text not null,
        caseJson text not null,
        createdAt text not null
      );
    `);
    await run(this.db, `create index if not exists idx_cases_status on cases(status, createdAt);`);
    await run(this.db, `create index if not exists idx_cases_conversation on cases(conversationId, messageSeq);`);

    await run(this.db, `
      create table if not exists audit_events (
        id text primary key,
        conversationId text not null,
        type text not null,
        actor text not null,
        payloadJson text not null,
        at text not null
      );
    `);
    await run(this.db, `create index if not exists idx_audit_conversation on audit_events(conversationId, at);`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => this.db.close((err) => (err ? reject(err) : resolve())));
  }

  async getConversation(id: string): Promise<Conversation | null> {
    const row = await get<ConversationRow>(this.db, `select * from conversations where id=?`, [id]);
    return row ? this.rowToConversation(row) : null;
  }

  async putConversation(c: Conversation, expectedVersion: number): Promise<PutResult> {
    const version = expectedVersion + 1;
    const values = [
      c.channel, c.state, JSON.stringify(c.activeTurns), JSON.stringify(c.pendingCaseIds), c.supervisorOverride ? 1 : 0,
      JSON.stringify(c.messages), version, c.createdAt, c.lastActivityAt
    ];

    const changes = expectedVersion === 0
      ? await run(this.db, `
          insert into conversations (
            channel, state, activeTurnsJson, pendingCaseIdsJson, supervisorOverride,
            messagesJson, version, createdAt, lastActivityAt, id
          ) values (?,?,?,?,?,?,?,?,?,?)
          on conflict(id) do nothing
        `, [...values, c.id])
      : await run(this.db, `
          update conversations set
            channel=?, state=?, activeTurnsJson=?, pendingCaseIdsJson=?, supervisorOverride=?,
            messagesJson=?, version=?, createdAt=?, lastActivityAt=?
          where id=? and version=?
        `, [...values, c.id, expectedVersion]);

    return changes === 1 ? { ok: true, version } : { ok: false, conflict: true };
  }

  async listConversations(q: { state?: ConversationState; limit?: number; offset?: number }): Promise<Conversation[]> {
    const limit = Math.min(q.limit ?? 50, 200);
    const offset = q.offset ?? 0;
    const where = q.state ? `where state = ?` : "";
    const params: unknown[] = q.state ? [q.state] : [];
    const rows = await all<ConversationRow>(this.db, `
      select * from conversations ${where}
      order by lastActivityAt desc
      limit ? offset ?
    `, [...params, limit, offset]);
    return rows.map(r => this.rowToConversation(r));
  }

  async createCase(c: SupervisionCase): Promise<void> {
    await run(this.db, `
      insert into cases (id, conversationId, messageSeq, status, caseJson, createdAt) values (?,?,?,?,?,?)
    `, [c.id, c.conversationId, c.messageSeq, c.status, JSON.stringify(c), c.createdAt]);
  }

  async getCase(id: string): Promise<SupervisionCase | null> {
    const row = await get<CaseRow>(this.db, `select caseJson from cases where id=?`, [id]);
    return row ? (JSON.parse(row.caseJson) as SupervisionCase) : null;
  }

  async findCase(conversationId: string, messageSeq: number): Promise<SupervisionCase | null> {
    const row = await get<CaseRow>(this.db, `
      select caseJson from cases where conversationId=? and messageSeq=? order by createdAt asc limit 1
    `, [conversationId, messageSeq]);
    return row ? (JSON.parse(row.caseJson) as SupervisionCase) : null;
  }

  async updateCase(c: SupervisionCase, expectedStatus: CaseStatus): Promise<boolean> {
    const changes = await run(this.db, `
      update cases set status=?, caseJson=? where id=? and status=?
    `, [c.status, JSON.stringify(c), c.id, expectedStatus]);
    return changes === 1;
  }

  async listCases(q: { status?: CaseStatus; conversationId?: string; limit?: number; offset?: number }): Promise<SupervisionCase[]> {
    const limit = Math.min(q.limit ?? 50, 200);
    const offset = q.offset ?? 0;

    const where: string[] = [];
    const params: unknown[] = [];
    if (q.status) { where.push(`status = ?`); params.push(q.status); }
    if (q.conversationId) { where.push(`conversationId = ?`); params.push(q.conversationId); }

    const rows = await all<CaseRow>(this.db, `
      select caseJson from cases
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by createdAt asc, rowid asc
      limit ? offset ?
    `, [...params, limit, offset]);
    return rows.map(r => JSON.parse(r.caseJson) as SupervisionCase);
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    await run(this.db, `
      insert into audit_events (id, conversationId, type, actor, payloadJson, at)
      values (?,?,?,?,?,?)
    `, [ev.id, ev.conversationId, ev.type, ev.actor, JSON.stringify(ev.payload ?? {}), ev.at]);
  }

  async listAudit(conversationId: string, limit: number = 200): Promise<AuditEvent[]> {
    const rows = await all<AuditRow>(this.db, `
      select * from audit_events
      where conversationId=?
      order by at desc, rowid desc
      limit ?
    `, [conversationId, Math.min(limit, 1000)]);
    return rows.reverse().map(r => ({
      id: r.id,
      conversationId: r.conversationId,
      type: r.type,
      actor: r.actor,
      payload: JSON.parse(r.payloadJson || "{}") as Record<string, unknown>,
      at: r.at
    }));
  }

  private rowToConversation(r: ConversationRow): Conversation {
    return {
      id: r.id,
      channel: r.channel,
      state: r.state,
      activeTurns: JSON.parse(r.activeTurnsJson || "[]") as number[],
      pendingCaseIds: JSON.parse(r.pendingCaseIdsJson || "[]") as string[],
      supervisorOverride: r.supervisorOverride === 1,
      messages: JSON.parse(r.messagesJson || "[]") as Conversation["messages"],
      version: r.version,
      createdAt: r.createdAt,
      lastActivityAt: r.lastActivityAt
    };
  }
}
