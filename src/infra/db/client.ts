import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Typed ORM client for fixed tables plus the raw client for contract-generated SQL; `close` ends the pool.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 10, onnotice: () => undefined });
  const db = drizzle(sql);
  return { db, sql, close: () => sql.end({ timeout: 5 }) };
};

export type Database = ReturnType<typeof createDb>;
