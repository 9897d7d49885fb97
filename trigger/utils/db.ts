import { readFile } from "node:fs/promises";
import postgres from "postgres";

export type Sql = ReturnType<typeof postgres>;

// Create a singleton postgres client
let sql: Sql | null = null;

export function getDb(): Sql {
  if (!sql) {
    const connectionString = process.env.DATABASE_URL;

    if (!connectionString) {
      throw new Error("DATABASE_URL environment variable is not set");
    }

    sql = postgres(connectionString, {
      max: 10, // Connection pool size
      idle_timeout: 20,
      connect_timeout: 10,
    });
  }

  return sql;
}

export async function closeDb(): Promise<void> {
  if (sql) {
    await sql.end({ timeout: 5 });
    sql = null;
  }
}

const SCHEMA_URL = new URL("../../sql/schema.sql", import.meta.url);

/**
 * Applies sql/schema.sql. Every statement in it is idempotent.
 */
export async function migrate(db: Sql = getDb()): Promise<void> {
  const schema = await readFile(SCHEMA_URL, "utf-8");
  console.log(`[db] Applying schema from ${SCHEMA_URL.pathname}...`);
  await db.unsafe(schema);
  console.log(`[db] ✓ Schema up to date`);
}
