import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export { ledgerRecords } from "./schema.js";
export type { LedgerRow, NewLedgerRow } from "./schema.js";

const MIGRATION_PATH = fileURLToPath(new URL("../../drizzle/0000_ledger_records.sql", import.meta.url));

export function createDb(connectionString: string) {
  const client = postgres(connectionString, { max: 4 });
  const db = drizzle(client, { schema });
  return { db, close: () => client.end() };
}

export type Database = ReturnType<typeof createDb>["db"];

/** Creates the ledger table if it does not exist yet. */
export async function ensureSchema(db: Database): Promise<void> {
  const text = await readFile(MIGRATION_PATH, "utf8");
  const statements = text
    .split(";")
    .map((s) => s.trim())
    .filter(Boolean);
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
}
