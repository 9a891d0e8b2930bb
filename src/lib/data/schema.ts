import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';

// ============================================
// Candidate Snapshots
// ============================================

/** Contract picked by the ranker on a tick where the settlement gate was open */
export const candidateSnapshots = sqliteTable('candidate_snapshots', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  contractId: text('contract_id').notNull(),
  fundingRate: real('funding_rate').notNull(),
  fundingIntervalSeconds: integer('funding_interval_seconds').notNull(),
  priorityScore: real('priority_score').notNull(),
  markPrice: real('mark_price').notNull(),
  recordedAt: integer('recorded_at').notNull(),
});

// ============================================
// Hedge Events
// ============================================

export const hedgeEvents = sqliteTable('hedge_events', {
  id: text('id').primaryKey(),
  contractId: text('contract_id').notNull(),
  // opened | open_failed | rollback_failed | closed | close_failed | orphaned
  event: text('event').notNull(),
  direction: text('direction'),
  futuresContracts: integer('futures_contracts'),
  spotQuoteAmount: real('spot_quote_amount'),
  fundingRate: real('funding_rate'),
  futuresPnl: real('futures_pnl'),
  spotPnl: real('spot_pnl'),
  totalPnl: real('total_pnl'),
  detail: text('detail'),
  createdAt: integer('created_at').notNull(),
});

export type HedgeEventRow = typeof hedgeEvents.$inferSelect;
export type NewHedgeEvent = typeof hedgeEvents.$inferInsert;

/** Bootstrap DDL, kept in step with the tables above */
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS candidate_snapshots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  contract_id TEXT NOT NULL,
  funding_rate REAL NOT NULL,
  funding_interval_seconds INTEGER NOT NULL,
  priority_score REAL NOT NULL,
  mark_price REAL NOT NULL,
  recorded_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS hedge_events (
  id TEXT PRIMARY KEY,
  contract_id TEXT NOT NULL,
  event TEXT NOT NULL,
  direction TEXT,
  futures_contracts INTEGER,
  spot_quote_amount REAL,
  funding_rate REAL,
  futures_pnl REAL,
  spot_pnl REAL,
  total_pnl REAL,
  detail TEXT,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_hedge_events_contract ON hedge_events(contract_id);
`;
