import { index, jsonb, pgTable, serial, text, timestamp } from "drizzle-orm/pg-core";

export const ledgerRecords = pgTable(
  "ledger_records",
  {
    id: serial("id").primaryKey(),
    kind: text("kind").notNull(),
    day: text("day").notNull(),
    at: timestamp("at", { withTimezone: true }).notNull(),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
    recordedAt: timestamp("recorded_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    kindDayIdx: index("ledger_records_kind_day_idx").on(table.kind, table.day),
  }),
);

export type LedgerRow = typeof ledgerRecords.$inferSelect;
export type NewLedgerRow = typeof ledgerRecords.$inferInsert;
