import { and, asc, between, eq } from "drizzle-orm";
import { createDb, ensureSchema, ledgerRecords, type Database } from "@newsedge/shared/db";
import { PersistenceUnavailableError, errorMessage } from "../errors.js";
import { ledgerRecordSchema, type LedgerKind, type LedgerRecord, type PersistenceSink } from "./ledger.js";

export class PostgresLedger implements PersistenceSink {
  private db: Database;
  private closeClient: () => Promise<void>;

  constructor(connectionString: string) {
    const { db, close } = createDb(connectionString);
    this.db = db;
    this.closeClient = close;
  }

  async ping(): Promise<void> {
    try {
      await ensureSchema(this.db);
    } catch (err) {
      throw new PersistenceUnavailableError(`Postgres ledger unavailable: ${errorMessage(err)}`, { cause: err });
    }
  }

  async append(entry: LedgerRecord): Promise<void> {
    try {
      await this.db.insert(ledgerRecords).values({
        kind: entry.kind,
        day: entry.date,
        at: new Date(entry.at),
        payload: entry.payload,
      });
    } catch (err) {
      throw new PersistenceUnavailableError(`Failed to insert ${entry.kind} record: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async read(kind: LedgerKind, fromDate: string, toDate: string): Promise<LedgerRecord[]> {
    const rows = await this.db
      .select()
      .from(ledgerRecords)
      .where(and(eq(ledgerRecords.kind, kind), between(ledgerRecords.day, fromDate, toDate)))
      .orderBy(asc(ledgerRecords.id));

    return rows.map((row) =>
      ledgerRecordSchema.parse({
        kind: row.kind,
        date: row.day,
        at: row.at.toISOString(),
        payload: row.payload,
      }),
    );
  }

  async close(): Promise<void> {
    await this.closeClient();
  }
}
