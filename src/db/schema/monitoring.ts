import {
  pgTable,
  varchar,
  bigserial,
  text,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// ─── Monitor Runs ────────────────────────────────────────────────────────────

export type RunKind = 'ingestion' | 'recheck' | 'price_drops';
export type RunStatus = 'running' | 'completed' | 'partial' | 'failed';

export const monitorRuns = pgTable(
  'monitor_runs',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    kind: varchar('kind').$type<RunKind>().notNull(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    status: varchar('status').$type<RunStatus>().notNull(),
    errorMessage: text('error_message'),
    stats: jsonb('stats').$type<Record<string, unknown>>(),
  },
  (table) => [index('idx_monitor_runs_kind_started').on(table.kind, table.startedAt)],
);

export type MonitorRun = typeof monitorRuns.$inferSelect;
export type NewMonitorRun = typeof monitorRuns.$inferInsert;
