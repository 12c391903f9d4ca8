export interface KincareClientConfig {
  /** API origin; `/v1` is appended when missing */
  baseUrl?: string;
  fetch?: typeof globalThis.fetch;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

// ── Sessions ───────────────────────────────────────────────────────────

export type ChatRole = 'user' | 'assistant' | 'system';

export interface ChatSession {
  id: string;
  familyMemberId: string;
  title: string;
  isPinned: boolean;
  sortOrder: number;
  createdAt: string;
  updatedAt: string;
}

export interface ChatSessionSummary extends ChatSession {
  messageCount: number;
  /** Latest user message, cut to 100 characters */
  lastMessage: string | null;
}

export interface RagContextEntry {
  labEventId: string;
  personId: string;
  score: number;
}

export interface ChatMessage {
  id: string;
  sessionId: string;
  seq: number;
  role: ChatRole;
  content: string;
  imageRef: string | null;
  model: string | null;
  ragContext: RagContextEntry[] | null;
  createdAt: string;
}

export interface CreateSessionInput {
  familyMemberId: string;
  title?: string;
}

export interface ListSessionsInput {
  familyMemberId?: string;
  limit?: number;
}

export interface ListSessionsResult {
  sessions: ChatSessionSummary[];
  total: number;
}

export interface UpdateSessionInput {
  title?: string;
  isPinned?: boolean;
  sortOrder?: number;
}

export interface SessionOrder {
  id: string;
  sortOrder: number;
}

export interface ListMessagesInput {
  limit?: number;
  offset?: number;
}

export interface ListMessagesResult {
  messages: ChatMessage[];
  limit: number;
  offset: number;
  hasMore: boolean;
}

// ── Graph ──────────────────────────────────────────────────────────────

export interface SearchHistoryInput {
  query: string;
  familyMemberId: string;
  topK?: number;
  /** Member asking, when not the member searched */
  actorId?: string;
}

export interface LabResult {
  testName: string;
  value: string | null;
  unit: string | null;
  referenceRange: string | null;
  flag: string | null;
}

export interface HistoryMatch {
  labEventId: string;
  personId: string;
  date: string | null;
  summary: string;
  score: number;
  labResults: LabResult[];
  conditions: Array<{ name: string; icd10Code: string | null; status: string | null; diagnosisDate: string | null }>;
  medications: Array<{ name: string; dosage: string | null; frequency: string | null }>;
  appointments: Array<{
    id: string;
    date: string;
    time: string | null;
    provider: string | null;
    purpose: string | null;
  }>;
}

export interface SearchHistoryResult {
  matches: HistoryMatch[];
  total: number;
  topK: number;
}

export interface MedicationInteraction {
  medicationA: string;
  medicationB: string;
  severity: string | null;
  description: string | null;
}

export interface HereditaryRisksInput {
  familyMemberId: string;
  actorId?: string;
}

export interface HereditaryRisk {
  parentId: string;
  parentName: string;
  condition: string;
  /** 'unknown' when the graph records none */
  inheritancePattern: string;
  riskPercent: number;
}

export interface SimilarLabEventsInput {
  familyMemberId: string;
  labEventId: string;
  topK?: number;
  actorId?: string;
}

export interface SimilarLabEvent {
  labEventId: string;
  date: string | null;
  summary: string;
  score: number;
}

export interface SimilarLabEventsResult {
  sourceLabEventId: string;
  labEvents: SimilarLabEvent[];
  total: number;
  topK: number;
}

export interface EmbeddingStats {
  totalLabEvents: number;
  withEmbeddings: number;
  withSummaries: number;
  missingEmbeddings: number;
  coveragePercent: number;
  vectorIndexes: string[];
}

// ── Consent ────────────────────────────────────────────────────────────

export interface ConsentGrantInput {
  actorId: string;
  personId: string;
  /** A privacy category, or '*' for all of them */
  category: string;
}

export interface ConsentGrant extends ConsentGrantInput {
  id: string;
  grantedAt: string;
}

// ── Chat channel ───────────────────────────────────────────────────────

export type ChatErrorCode =
  | 'RETRIEVAL_UNAVAILABLE'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_FAILURE'
  | 'GENERATION_CANCELLED'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'SESSION_NOT_FOUND'
  | 'LAB_EVENT_NOT_FOUND'
  | 'SESSION_STORE_UNAVAILABLE';

export interface SendMessageInput {
  /** Omit to start a new session */
  sessionId?: string;
  familyMemberId: string;
  message: string;
  image?: string;
  imageRef?: string;
  actorId?: string;
}

export type ChatServerMessage =
  | { type: 'session'; sessionId: string; title: string }
  | { type: 'context'; sessionId: string; labEventIds: string[]; droppedUnits: number }
  | { type: 'token'; sessionId: string; content: string }
  | {
      type: 'done';
      sessionId: string;
      messageId: string;
      content: string;
      model: string;
      truncated: boolean;
    }
  | {
      type: 'error';
      sessionId: string | null;
      code: ChatErrorCode;
      message: string;
      retryable: boolean;
    };

export type ChatServerMessageType = ChatServerMessage['type'];
