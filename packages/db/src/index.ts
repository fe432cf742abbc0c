import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";

export type Database = PostgresJsDatabase<typeof schema>;

export interface DbOptions {
  /** Max pooled connections */
  max?: number;
}

export interface DbConnection {
  db: Database;
  close(): Promise<void>;
}

export function createDb(databaseUrl: string, options: DbOptions = {}): DbConnection {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 30, // Close idle connections after 30 seconds
    connect_timeout: 10,
    prepare: false, // Disable prepared statements for pooler compatibility
  });
  return {
    db: drizzle(sql, { schema }),
    close: () => sql.end(),
  };
}
