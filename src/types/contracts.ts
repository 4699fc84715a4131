export type Channel = "web" | "google_chat" | "slack" | "api";
export type Role = "user" | "bot" | "supervisor";
export type ConversationState = "idle" | "processing" | "awaiting_supervision";
export type PiiCategory = "name" | "address" | "contact" | "financial" | "identifier";
export type CaseStatus = "pending" | "approved" | "edited" | "rejected";
export type Decision = Exclude<CaseStatus, "pending">;
export type EscalationReason = "pii" | "low_confidence" | "supervisor_override" | "pipeline_error";

export interface InboundEvent {
  conversationId: string;
  channel: Channel;
  role: "user";
  text: string;
  timestamp: string; // ISO
}

export interface SupervisorDecisionEvent {
  caseId: string;
  decision: Decision;
  supervisorId: string;
  text?: string;
}

export type InboundResult =
  | { status: "sent"; reply: string }
  | { status: "pending" };

export interface PIIFinding {
  category: PiiCategory;
  start: number;
  end: number; // exclusive
  text: string;
  confidence: number;
  rule: string;
}

export interface Message {
  seq: number;
  role: Role;
  text: string;
  redactedText: string | null;
  findings: PIIFinding[];
  fingerprint?: string;
  inReplyTo?: number;
  at: string; // ISO
}

export interface Conversation {
  id: string;
  channel: Channel;
  messages: Message[];
  state: ConversationState;
  activeTurns: number[]; // seqs of user messages whose turn is still running
  pendingCaseIds: string[];
  supervisorOverride: boolean;
  version: number;
  createdAt: string; // ISO
  lastActivityAt: string; // ISO
}

export interface Passage {
  id: string;
  title: string;
  content: string;
  source: string;
  score: number;
  updatedAt: string; // ISO
}

export interface DraftResponse {
  text: string;
  confidence: number;
  citations: string[];
}

export interface SupervisionCase {
  id: string;
  conversationId: string;
  messageSeq: number;
  draft: DraftResponse | null;
  reasons: EscalationReason[];
  status: CaseStatus;
  supervisorId: string | null;
  resolutionText: string | null;
  createdAt: string; // ISO
  resolvedAt: string | null;
}

export interface AuditEvent {
  id: string;
  conversationId: string;
  type: string;
  actor: string; // "system" or a supervisor id
  payload: Record<string, unknown>;
  at: string; // ISO
}
