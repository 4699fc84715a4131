import { AuditEvent, CaseStatus, Conversation, ConversationState, SupervisionCase } from "../types/contracts.js";

export type PutResult = { ok: true; version: number } | { ok: false; conflict: true };

export interface ConversationStore {
  init(): Promise<void>;

  getConversation(id: string): Promise<Conversation | null>;
  /**
   * Conditional write: stores the conversation as version expectedVersion + 1
   * only if the stored version is still expectedVersion (0 = must not exist).
   */
  putConversation(conversation: Conversation, expectedVersion: number): Promise<PutResult>;
  listConversations(q: { state?: ConversationState; limit?: number; offset?: number }): Promise<Conversation[]>;

  createCase(c: SupervisionCase): Promise<void>;
  getCase(id: string): Promise<SupervisionCase | null>;
  /** The case opened for one user message, if any. */
  findCase(conversationId: string, messageSeq: number): Promise<SupervisionCase | null>;
  /** Writes only if the stored status is still expectedStatus; false otherwise. */
  updateCase(c: SupervisionCase, expectedStatus: CaseStatus): Promise<boolean>;
  listCases(q: { status?: CaseStatus; conversationId?: string; limit?: number; offset?: number }): Promise<SupervisionCase[]>;

  appendAudit(ev: AuditEvent): Promise<void>;
  listAudit(conversationId: string, limit?: number): Promise<AuditEvent[]>;
}
