/**
 * Kincare API Server
 *
 * Hono server for:
 * - REST API (/v1/*)
 * - Chat channel (/ws/chat)
 */

import 'dotenv/config';
import { Server } from 'node:http';
import { serve } from '@hono/node-server';
import { createApp, createServices, type ServiceAdapters } from '@/app';
import { loadConfig, type AppConfig } from '@/config';
import { createDatabase, type DatabaseHandle } from '@/db/client';
import { Neo4jGraphClient } from '@/db/graph';
import { describeError } from '@/errors/chat';
import { DrizzleConsentStore, InMemoryConsentStore } from '@/services/consent.service';
import { OllamaEmbeddingGateway } from '@/services/embedding.service';
import { Neo4jGraphQueryLayer } from '@/services/graph.service';
import { OllamaLlmGateway } from '@/services/llm.service';
import { DrizzleSessionStore, InMemorySessionStore } from '@/services/sessionStore.service';
import { logger } from '@/utils/logger';
import { attachChatSocket, CHAT_SOCKET_PATH } from '@/ws/chatSocket';

const SHUTDOWN_TIMEOUT_MS = 10_000;

function openDatabase(config: AppConfig): DatabaseHandle | null {
  if (config.sessionStore !== 'postgres' || !config.database.url) return null;
  return createDatabase({
    url: config.database.url,
    poolSize: config.database.poolSize,
    statementTimeoutMs: config.database.statementTimeoutMs,
    production: config.env === 'production',
  });
}

async function main() {
  const config = loadConfig();
  const database = openDatabase(config);
  if (!database) {
    logger.warn('Using in-memory session store; chat history is lost on restart');
  }

  const graphClient = new Neo4jGraphClient(config.neo4j);
  await graphClient.verify();

  const adapters: ServiceAdapters = {
    sessions: database ? new DrizzleSessionStore(database.db) : new InMemorySessionStore(),
    consent: database ? new DrizzleConsentStore(database.db) : new InMemoryConsentStore(),
    graph: new Neo4jGraphQueryLayer(graphClient, config.ollama.embeddingDimension),
    embeddings: new OllamaEmbeddingGateway({
      host: config.ollama.host,
      model: config.ollama.embeddingModel,
      dimension: config.ollama.embeddingDimension,
      timeoutMs: config.ollama.embedTimeoutMs,
    }),
    llm: new OllamaLlmGateway({
      host: config.ollama.host,
      timeoutMs: config.ollama.llmTimeoutMs,
    }),
  };

  const services = createServices(adapters, config);
  const app = createApp(services, { corsOrigins: config.corsOrigins });

  const server = serve({ fetch: app.fetch, port: config.port });
  if (!(server instanceof Server)) {
    throw new Error('Chat channel requires an HTTP/1.1 server');
  }
  const wss = attachChatSocket(server, services.orchestrator);

  logger.info('Kincare API server listening', {
    port: config.port,
    chatSocket: CHAT_SOCKET_PATH,
    sessionStore: config.sessionStore,
  });

  // Graceful shutdown with request drain
  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    for (const client of wss.clients) client.close(1001, 'Server shutting down');
    wss.close();
    server.close(() => {
      logger.info('HTTP server closed, draining connections');
      Promise.all([graphClient.close(), database?.close()])
        .then(() => {
          logger.info('Database connections closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing connections', { error: describeError(error) });
          process.exit(1);
        });
    });
    // Force exit if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', {
    error: describeError(error),
    details: error instanceof Error && 'details' in error ? error.details : undefined,
  });
  process.exit(1);
});
