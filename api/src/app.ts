/**
 * Application assembly
 *
 * createServices wires the chat core from its adapters; createApp mounts
 * the REST routes over those services. Both take their collaborators as
 * arguments so tests can pass in-process fakes.
 */

import { Hono } from 'hono';
import type { AppConfig } from '@/config';
import { createCorsMiddleware } from '@/middleware/cors';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { securityHeaders } from '@/middleware/securityHeaders';
import chatRoutes from '@/routes/chat';
import consentRoutes from '@/routes/consent';
import graphRoutes from '@/routes/graph';
import { ChatOrchestrator } from '@/services/chat/chatOrchestrator.service';
import type { ConsentStore } from '@/services/consent.service';
import type { EmbeddingGateway } from '@/services/embedding.service';
import type { GraphQueryLayer } from '@/services/graph.service';
import type { LlmGateway } from '@/services/llm.service';
import { PrivacyGate } from '@/services/privacy.service';
import { RetrievalEngine } from '@/services/retrieval.service';
import type { SessionStore } from '@/services/sessionStore.service';
import { TitleGenerator } from '@/services/title.service';
import type { AppServices, HonoEnv } from '@/types/hono';

export const API_VERSION = '0.1.0';

export interface ServiceAdapters {
  sessions: SessionStore;
  consent: ConsentStore;
  graph: GraphQueryLayer;
  embeddings: EmbeddingGateway;
  llm: LlmGateway;
  now?: () => Date;
}

export type ServiceSettings = Pick<AppConfig, 'ollama' | 'retrieval' | 'chat' | 'privacy'>;

export function createServices(adapters: ServiceAdapters, settings: ServiceSettings): AppServices {
  const now = adapters.now ?? (() => new Date());

  const retrieval = new RetrievalEngine({
    embeddings: adapters.embeddings,
    graph: adapters.graph,
    settings: {
      maxTopK: settings.retrieval.maxTopK,
      candidateMultiplier: settings.retrieval.candidateMultiplier,
      recencyWindowMonths: settings.retrieval.recencyWindowMonths,
    },
    now,
  });
  const privacy = new PrivacyGate({
    consentRequiredCategories: settings.privacy.consentRequiredCategories,
  });
  const titles = new TitleGenerator({
    sessions: adapters.sessions,
    llm: adapters.llm,
    model: settings.ollama.titleModel,
  });
  const orchestrator = new ChatOrchestrator({
    sessions: adapters.sessions,
    consent: adapters.consent,
    graph: adapters.graph,
    retrieval,
    privacy,
    llm: adapters.llm,
    titles,
    settings: {
      chatModel: settings.ollama.chatModel,
      defaultTopK: settings.retrieval.defaultTopK,
      recencyWindowMonths: settings.retrieval.recencyWindowMonths,
      contextBudgetChars: settings.chat.contextBudgetChars,
      historyMaxMessages: settings.chat.historyMaxMessages,
    },
    now,
  });

  return {
    sessions: adapters.sessions,
    consent: adapters.consent,
    graph: adapters.graph,
    retrieval,
    privacy,
    titles,
    orchestrator,
    settings: {
      defaultTopK: settings.retrieval.defaultTopK,
      maxTopK: settings.retrieval.maxTopK,
      recencyWindowMonths: settings.retrieval.recencyWindowMonths,
    },
    now,
  };
}

export function createApp(services: AppServices, options: { corsOrigins?: readonly string[] } = {}) {
  const app = new Hono<HonoEnv>();

  // Global middleware chain
  app.use('*', securityHeaders);
  app.use('*', createCorsMiddleware(options.corsOrigins ?? []));
  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: services.now().toISOString(),
      version: API_VERSION,
    });
  });

  app.route('/v1/chat', chatRoutes);
  app.route('/v1/graph', graphRoutes);
  app.route('/v1/consent', consentRoutes);

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}
