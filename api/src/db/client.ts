/**
 * Database Connection Pool
 *
 * Manages PostgreSQL connections using the `postgres` driver
 * with Drizzle ORM for type-safe queries.
 */

import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Close the connection pool; used during graceful shutdown */
  close(): Promise<void>;
}

export interface DatabaseOptions {
  url: string;
  poolSize: number;
  production: boolean;
  /** Server-side limit for every statement */
  statementTimeoutMs: number;
}

/** Startup parameters sent with each new connection */
export function connectionParameters(options: Pick<DatabaseOptions, 'statementTimeoutMs'>) {
  return {
    application_name: 'kincare-api',
    statement_timeout: options.statementTimeoutMs,
  };
}

export function createDatabase(options: DatabaseOptions): DatabaseHandle {
  const sql = postgres(options.url, {
    max: options.poolSize,
    idle_timeout: 20, // Close idle connections after 20 seconds
    connect_timeout: 10,
    ssl: options.production ? 'require' : false,
    connection: connectionParameters(options),
  });

  return {
    db: drizzle(sql, { schema }),
    close: () => sql.end(),
  };
}
