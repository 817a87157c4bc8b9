import { and, desc, eq, ne } from 'drizzle-orm';
import type { Database } from '../db/connection.js';
import { monitorRuns, type MonitorRun, type RunKind, type RunStatus } from '../db/schema/index.js';

export type RunStats = Record<string, unknown>;

export interface RunLog {
  start(kind: RunKind): Promise<number>;
  finish(runId: number, status: Exclude<RunStatus, 'running'>, stats: RunStats, error?: string): Promise<void>;
  /** Most recent finished run of each kind. */
  lastRuns(): Promise<Partial<Record<RunKind, MonitorRun>>>;
}

const RUN_KINDS: readonly RunKind[] = ['ingestion', 'recheck', 'price_drops'];

export class DrizzleRunLog implements RunLog {
  constructor(private readonly db: Database) {}

  async start(kind: RunKind): Promise<number> {
    const [run] = await this.db
      .insert(monitorRuns)
      .values({ kind, startedAt: new Date(), status: 'running' })
      .returning({ id: monitorRuns.id });
    return run.id;
  }

  async finish(
    runId: number,
    status: Exclude<RunStatus, 'running'>,
    stats: RunStats,
    error?: string,
  ): Promise<void> {
    await this.db
      .update(monitorRuns)
      .set({ completedAt: new Date(), status, stats, errorMessage: error ?? null })
      .where(eq(monitorRuns.id, runId));
  }

  async lastRuns(): Promise<Partial<Record<RunKind, MonitorRun>>> {
    const result: Partial<Record<RunKind, MonitorRun>> = {};
    for (const kind of RUN_KINDS) {
      const [run] = await this.db
        .select()
        .from(monitorRuns)
        .where(and(eq(monitorRuns.kind, kind), ne(monitorRuns.status, 'running')))
        .orderBy(desc(monitorRuns.startedAt))
        .limit(1);
      if (run) result[kind] = run;
    }
    return result;
  }
}
