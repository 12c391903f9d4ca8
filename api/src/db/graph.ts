/**
 * Graph Store Connection
 *
 * Neo4j driver wrapper. Every read runs in a managed read transaction
 * with a server-side timeout; rows come back as plain objects with
 * integers and temporal values converted to numbers and ISO strings.
 */

import neo4j, { type Config, type Driver } from 'neo4j-driver';
import { logger } from '@/utils/logger';

export type GraphRow = Record<string, unknown>;

/**
 * Read-only query surface used by the graph query layer
 */
export interface GraphReader {
  read(cypher: string, params?: Record<string, unknown>): Promise<GraphRow[]>;
}

export interface GraphClientOptions {
  uri: string;
  user: string;
  password: string;
  database?: string;
  timeoutMs: number;
}

/**
 * Every bound follows GRAPH_TIMEOUT_MS, including the managed-transaction
 * retry loop, so a graph outage fails a read within that window.
 */
export function buildDriverConfig(options: Pick<GraphClientOptions, 'timeoutMs'>): Config {
  return {
    maxConnectionPoolSize: 50,
    connectionAcquisitionTimeout: options.timeoutMs,
    connectionTimeout: options.timeoutMs,
    maxTransactionRetryTime: options.timeoutMs,
  };
}

export class Neo4jGraphClient implements GraphReader {
  private readonly driver: Driver;
  private readonly options: GraphClientOptions;

  constructor(options: GraphClientOptions) {
    this.options = options;
    this.driver = neo4j.driver(
      options.uri,
      neo4j.auth.basic(options.user, options.password),
      buildDriverConfig(options)
    );
  }

  async verify(): Promise<void> {
    await this.driver.verifyConnectivity();
    logger.info('Neo4j connected', { uri: this.options.uri, database: this.options.database });
  }

  async read(cypher: string, params: Record<string, unknown> = {}): Promise<GraphRow[]> {
    const session = this.driver.session({
      database: this.options.database,
      defaultAccessMode: neo4j.session.READ,
    });

    try {
      return await session.executeRead(
        async (tx) => {
          const result = await tx.run(cypher, params);
          return result.records.map((record) => normalizeRow(record.toObject()));
        },
        { timeout: this.options.timeoutMs }
      );
    } catch (error) {
      logger.error('Neo4j query error', {
        error: error instanceof Error ? error.message : String(error),
        query: cypher.trim().substring(0, 100),
      });
      throw error;
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

export function normalizeRow(row: GraphRow): GraphRow {
  const out: GraphRow = {};
  for (const [key, value] of Object.entries(row)) {
    out[key] = normalizeValue(value);
  }
  return out;
}

function normalizeValue(value: unknown): unknown {
  if (neo4j.isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (neo4j.isDate(value) || neo4j.isDateTime(value) || neo4j.isLocalDateTime(value)) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      out[key] = normalizeValue(nested);
    }
    return out;
  }
  return value;
}

/** Cypher LIMIT parameters must be integers, not floats */
export function toCypherInt(value: number) {
  return neo4j.int(Math.trunc(value));
}
