import type { AppContext } from '../app/context.js';
import { TaskInProgressError } from '../lib/errors.js';

export type TaskName = 'ingestion' | 'recheck' | 'priceDrops';

interface TaskState {
  running: boolean;
  lastRunEnd: Date | null;
  nextRunAt: Date | null;
}

const STOP_TIMEOUT_MS = 60_000;

// ─── Time helpers ────────────────────────────────────────────────────────────

export function parseTimeOfDay(value: string): { hours: number; minutes: number } {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) throw new Error(`Invalid time of day: ${value}`);
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) throw new Error(`Invalid time of day: ${value}`);
  return { hours, minutes };
}

/**
 * Local hour inside [startHour, endHour). A window with start after end wraps midnight;
 * start equal to end is an empty window.
 */
export function isInNightWindow(date: Date, startHour: number, endHour: number): boolean {
  const hour = date.getHours();
  if (startHour === endHour) return false;
  if (startHour < endHour) return hour >= startHour && hour < endHour;
  return hour >= startHour || hour < endHour;
}

/** Next local occurrence of `time` strictly after `now`. */
export function nextDailyRun(now: Date, time: string): Date {
  const { hours, minutes } = parseTimeOfDay(time);
  const next = new Date(now);
  next.setHours(hours, minutes, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

/** Next local `weekday` (0 = Sunday) at `time`, strictly after `now`. */
export function nextWeeklyRun(now: Date, weekday: number, time: string): Date {
  const { hours, minutes } = parseTimeOfDay(time);
  const next = new Date(now);
  next.setHours(hours, minutes, 0, 0);
  next.setDate(next.getDate() + ((weekday - now.getDay() + 7) % 7));
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 7);
  }
  return next;
}

/** Uniform in [base - jitter, base + jitter], never negative. */
export function jitteredDelayMs(baseMs: number, jitterMs: number, random: () => number = Math.random): number {
  return Math.max(0, Math.round(baseMs + (random() * 2 - 1) * jitterMs));
}

// ─── Scheduler ───────────────────────────────────────────────────────────────

export function createScheduler(context: AppContext) {
  const { env } = context;
  const logger = context.logger.child({ component: 'scheduler' });

  const tasks: Record<TaskName, TaskState> = {
    ingestion: { running: false, lastRunEnd: null, nextRunAt: null },
    recheck: { running: false, lastRunEnd: null, nextRunAt: null },
    priceDrops: { running: false, lastRunEnd: null, nextRunAt: null },
  };

  let isRunning = false;
  let loops: Promise<void>[] = [];
  const wakers = new Set<() => void>();

  /** Sleep that `stop()` cuts short. */
  function wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        wakers.delete(done);
        resolve();
      }
      wakers.add(done);
    });
  }

  async function runTask(name: TaskName, task: () => Promise<unknown>): Promise<void> {
    const state = tasks[name];
    state.running = true;
    try {
      await task();
    } catch (err) {
      if (err instanceof TaskInProgressError) {
        logger.info({ task: name }, 'Task already running (manual trigger); skipping this slot');
      } else {
        logger.error({ err, task: name }, 'Scheduled task failed');
      }
    } finally {
      state.running = false;
      state.lastRunEnd = new Date();
    }
  }

  /**
   * Ingestion: interval ± jitter, paused inside the night window.
   * Non-overlapping: the next wait starts after the pass completes.
   */
  async function runIngestionLoop(): Promise<void> {
    const state = tasks.ingestion;

    while (isRunning) {
      const now = new Date();
      if (isInNightWindow(now, env.NIGHT_PAUSE_START_HOUR, env.NIGHT_PAUSE_END_HOUR)) {
        const resumeAt = nextDailyRun(now, `${String(env.NIGHT_PAUSE_END_HOUR).padStart(2, '0')}:00`);
        state.nextRunAt = resumeAt;
        logger.info({ resumeAt: resumeAt.toISOString() }, 'Night pause: ingestion suspended');
        await wait(resumeAt.getTime() - now.getTime());
        continue;
      }

      await runTask('ingestion', () => context.ingestion.runAll());

      if (isRunning) {
        const delay = jitteredDelayMs(env.INGEST_INTERVAL_SECONDS * 1000, env.INGEST_JITTER_SECONDS * 1000);
        state.nextRunAt = new Date(Date.now() + delay);
        logger.debug({ delayMs: delay }, 'Waiting before next ingestion pass');
        await wait(delay);
      }
    }
  }

  async function runAtLoop(name: TaskName, nextRun: (now: Date) => Date, task: () => Promise<unknown>): Promise<void> {
    const state = tasks[name];

    while (isRunning) {
      const now = new Date();
      const next = nextRun(now);
      state.nextRunAt = next;
      logger.info({ task: name, nextRunAt: next.toISOString() }, 'Task scheduled');

      await wait(next.getTime() - now.getTime());
      if (isRunning) {
        await runTask(name, task);
      }
    }
  }

  return {
    start(): void {
      if (isRunning) return;
      isRunning = true;

      logger.info(
        { filters: [...context.filters.keys()], recheckAt: env.RECHECK_TIME, priceDropWeekday: env.PRICE_DROP_WEEKDAY },
        'Starting scheduler loops',
      );

      loops = [
        runIngestionLoop(),
        runAtLoop(
          'recheck',
          (now) => nextDailyRun(now, env.RECHECK_TIME),
          () => context.changeDetection.runScheduledPass(),
        ),
        runAtLoop(
          'priceDrops',
          (now) => nextWeeklyRun(now, env.PRICE_DROP_WEEKDAY, env.PRICE_DROP_TIME),
          () =>
            context.priceDrops.run({
              lookbackDays: env.PRICE_DROP_LOOKBACK_DAYS,
              thresholdEuros: env.PRICE_DROP_THRESHOLD_EUR,
            }),
        ),
      ];
    },

    async stop(): Promise<void> {
      isRunning = false;
      logger.info('Scheduler stopping; waiting for active tasks to complete');

      for (const wake of [...wakers]) wake();

      let timer: NodeJS.Timeout | undefined;
      const finished = await Promise.race([
        Promise.all(loops).then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), STOP_TIMEOUT_MS);
        }),
      ]);
      clearTimeout(timer);
      if (!finished) {
        logger.warn({ timeoutMs: STOP_TIMEOUT_MS }, 'Tasks still running at shutdown');
      }

      logger.info('Scheduler stopped');
    },

    getState() {
      return {
        isRunning,
        tasks: {
          ingestion: { ...tasks.ingestion },
          recheck: { ...tasks.recheck },
          priceDrops: { ...tasks.priceDrops },
        },
      };
    },
  };
}

export type Scheduler = ReturnType<typeof createScheduler>;
