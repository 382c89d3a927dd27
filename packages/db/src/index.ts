import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";
export { schema };

export type Schema = typeof schema;

export type Database = PostgresJsDatabase<Schema>;

/**
 * Any drizzle Postgres database over this schema, whatever the driver
 * (postgres-js in production, PGlite in tests).
 */
export type SchemaDatabase<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT> = PgDatabase<
  TQueryResult,
  Schema
>;

export interface DbPoolOptions {
  /** Maximum pooled connections (default: 20) */
  max?: number;
  /** Close idle connections after N seconds (default: 30) */
  idleTimeoutSeconds?: number;
  /** Connection timeout in seconds (default: 10) */
  connectTimeoutSeconds?: number;
}

export interface DbHandle {
  db: Database;
  /** Drain the pool (graceful shutdown) */
  close(): Promise<void>;
}

export function createDb(databaseUrl: string, options: DbPoolOptions = {}): DbHandle {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 20,
    idle_timeout: options.idleTimeoutSeconds ?? 30,
    connect_timeout: options.connectTimeoutSeconds ?? 10,
    max_lifetime: 60 * 30,
    prepare: false,
  });

  return {
    db: drizzle(sql, { schema }),
    close: () => sql.end({ timeout: 5 }),
  };
}
