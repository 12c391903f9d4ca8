/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { ChatOrchestrator } from '@/services/chat/chatOrchestrator.service';
import type { ConsentStore } from '@/services/consent.service';
import type { GraphQueryLayer } from '@/services/graph.service';
import type { PrivacyGate } from '@/services/privacy.service';
import type { RetrievalEngine } from '@/services/retrieval.service';
import type { SessionStore } from '@/services/sessionStore.service';
import type { TitleGenerator } from '@/services/title.service';

/**
 * Everything a route needs, built once at startup and injected per request
 */
export interface AppServices {
  sessions: SessionStore;
  consent: ConsentStore;
  graph: GraphQueryLayer;
  retrieval: RetrievalEngine;
  privacy: PrivacyGate;
  titles: TitleGenerator;
  orchestrator: ChatOrchestrator;
  settings: {
    defaultTopK: number;
    maxTopK: number;
    recencyWindowMonths: number;
  };
  now: () => Date;
}

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: {
    services: AppServices;
  };
};
