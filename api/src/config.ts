/**
 * Application Configuration
 *
 * Parses process.env once at startup. Invalid configuration is fatal and
 * surfaces as a ConfigurationError listing every offending variable.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/errors/chat';

const csv = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGINS: csv.default(''),

    SESSION_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().url().optional(),
    DB_POOL_SIZE: z.coerce.number().int().positive().default(20),
    DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

    NEO4J_URI: z.string().min(1).default('bolt://localhost:7687'),
    NEO4J_USER: z.string().min(1).default('neo4j'),
    NEO4J_PASSWORD: z.string().min(1),
    NEO4J_DATABASE: z.string().min(1).optional(),

    OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
    CHAT_MODEL: z.string().min(1).default('llama3.2-vision:11b'),
    TITLE_MODEL: z.string().min(1).optional(),
    EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    EMBEDDING_DIM: z.coerce.number().int().positive().default(768),

    EMBED_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
    GRAPH_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),

    RETRIEVAL_DEFAULT_TOP_K: z.coerce.number().int().positive().default(5),
    RETRIEVAL_MAX_TOP_K: z.coerce.number().int().positive().default(8),
    RETRIEVAL_CANDIDATE_MULTIPLIER: z.coerce.number().int().positive().default(3),
    RECENCY_WINDOW_MONTHS: z.coerce.number().int().nonnegative().default(6),
    CONTEXT_BUDGET_CHARS: z.coerce.number().int().positive().default(6_000),
    HISTORY_MAX_MESSAGES: z.coerce.number().int().nonnegative().default(20),

    CONSENT_REQUIRED_CATEGORIES: csv.default('sexual_health,reproductive,std_history'),
  })
  .superRefine((env, ctx) => {
    if (env.SESSION_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when SESSION_STORE=postgres',
      });
    }
    if (env.RETRIEVAL_DEFAULT_TOP_K > env.RETRIEVAL_MAX_TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRIEVAL_DEFAULT_TOP_K'],
        message: 'RETRIEVAL_DEFAULT_TOP_K must not exceed RETRIEVAL_MAX_TOP_K',
      });
    }
  });

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  corsOrigins: string[];
  sessionStore: 'postgres' | 'memory';
  database: { url?: string; poolSize: number; statementTimeoutMs: number };
  neo4j: { uri: string; user: string; password: string; database?: string; timeoutMs: number };
  ollama: {
    host: string;
    chatModel: string;
    titleModel: string;
    embeddingModel: string;
    embeddingDimension: number;
    embedTimeoutMs: number;
    llmTimeoutMs: number;
  };
  retrieval: {
    defaultTopK: number;
    maxTopK: number;
    candidateMultiplier: number;
    recencyWindowMonths: number;
  };
  chat: {
    contextBudgetChars: number;
    historyMaxMessages: number;
  };
  privacy: {
    consentRequiredCategories: string[];
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map((issue) => issue.variable).join(', ')}`,
      issues,
    );
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS,
    sessionStore: e.SESSION_STORE,
    database: { url: e.DATABASE_URL, poolSize: e.DB_POOL_SIZE, statementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS },
    neo4j: {
      uri: e.NEO4J_URI,
      user: e.NEO4J_USER,
      password: e.NEO4J_PASSWORD,
      database: e.NEO4J_DATABASE,
      timeoutMs: e.GRAPH_TIMEOUT_MS,
    },
    ollama: {
      host: e.OLLAMA_HOST,
      chatModel: e.CHAT_MODEL,
      titleModel: e.TITLE_MODEL ?? e.CHAT_MODEL,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingDimension: e.EMBEDDING_DIM,
      embedTimeoutMs: e.EMBED_TIMEOUT_MS,
      llmTimeoutMs: e.LLM_TIMEOUT_MS,
    },
    retrieval: {
      defaultTopK: e.RETRIEVAL_DEFAULT_TOP_K,
      maxTopK: e.RETRIEVAL_MAX_TOP_K,
      candidateMultiplier: e.RETRIEVAL_CANDIDATE_MULTIPLIER,
      recencyWindowMonths: e.RECENCY_WINDOW_MONTHS,
    },
    chat: {
      contextBudgetChars: e.CONTEXT_BUDGET_CHARS,
      historyMaxMessages: e.HISTORY_MAX_MESSAGES,
    },
    privacy: {
      consentRequiredCategories: e.CONSENT_REQUIRED_CATEGORIES,
    },
  };
}
