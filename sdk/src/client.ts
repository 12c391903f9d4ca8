import { ChatChannel, chatSocketUrl, type ChatTransport } from './channel.js';
import { ChatApiTransport } from './http.js';
import {
  grantConsentMethod,
  listConsentMethod,
  revokeConsentMethod,
} from './methods/consent.js';
import {
  findSimilarLabEventsMethod,
  getEmbeddingStatsMethod,
  getHereditaryRisksMethod,
  getMedicationInteractionsMethod,
  searchHistoryMethod,
} from './methods/graph.js';
import {
  createSessionMethod,
  deleteSessionMethod,
  generateTitleMethod,
  getSessionMethod,
  listMessagesMethod,
  listSessionsMethod,
  reorderSessionsMethod,
  updateSessionMethod,
} from './methods/sessions.js';
import type {
  ChatSession,
  ConsentGrant,
  ConsentGrantInput,
  CreateSessionInput,
  EmbeddingStats,
  HereditaryRisk,
  HereditaryRisksInput,
  KincareClientConfig,
  ListMessagesInput,
  ListMessagesResult,
  ListSessionsInput,
  ListSessionsResult,
  MedicationInteraction,
  SearchHistoryInput,
  SearchHistoryResult,
  SessionOrder,
  SimilarLabEventsInput,
  SimilarLabEventsResult,
  UpdateSessionInput,
} from './types.js';

export class KincareClient {
  private readonly api: ChatApiTransport;

  constructor(config: KincareClientConfig = {}) {
    this.api = new ChatApiTransport(config);
  }

  /** ws(s) URL of the chat channel on the same origin */
  get socketUrl(): string {
    return chatSocketUrl(this.api.baseUrl);
  }

  openChannel(transport: ChatTransport): ChatChannel {
    return new ChatChannel(transport);
  }

  async createSession(input: CreateSessionInput): Promise<ChatSession> {
    return createSessionMethod(this.api, input);
  }

  async listSessions(input: ListSessionsInput = {}): Promise<ListSessionsResult> {
    return listSessionsMethod(this.api, input);
  }

  async getSession(id: string): Promise<ChatSession> {
    return getSessionMethod(this.api, id);
  }

  async updateSession(id: string, input: UpdateSessionInput): Promise<ChatSession> {
    return updateSessionMethod(this.api, id, input);
  }

  async deleteSession(id: string): Promise<void> {
    return deleteSessionMethod(this.api, id);
  }

  async reorderSessions(orders: SessionOrder[]): Promise<number> {
    return reorderSessionsMethod(this.api, orders);
  }

  async listMessages(id: string, input: ListMessagesInput = {}): Promise<ListMessagesResult> {
    return listMessagesMethod(this.api, id, input);
  }

  async generateTitle(id: string): Promise<ChatSession> {
    return generateTitleMethod(this.api, id);
  }

  async searchHistory(input: SearchHistoryInput): Promise<SearchHistoryResult> {
    return searchHistoryMethod(this.api, input);
  }

  async getMedicationInteractions(familyMemberId: string): Promise<MedicationInteraction[]> {
    return getMedicationInteractionsMethod(this.api, familyMemberId);
  }

  async getHereditaryRisks(input: HereditaryRisksInput): Promise<HereditaryRisk[]> {
    return getHereditaryRisksMethod(this.api, input);
  }

  async findSimilarLabEvents(input: SimilarLabEventsInput): Promise<SimilarLabEventsResult> {
    return findSimilarLabEventsMethod(this.api, input);
  }

  async getEmbeddingStats(): Promise<EmbeddingStats> {
    return getEmbeddingStatsMethod(this.api);
  }

  async listConsent(actorId: string): Promise<ConsentGrant[]> {
    return listConsentMethod(this.api, actorId);
  }

  async grantConsent(input: ConsentGrantInput): Promise<ConsentGrant> {
    return grantConsentMethod(this.api, input);
  }

  async revokeConsent(input: ConsentGrantInput): Promise<number> {
    return revokeConsentMethod(this.api, input);
  }
}
