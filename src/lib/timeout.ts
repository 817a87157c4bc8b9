import { SourceTimeoutError } from './errors.js';

/** How long aborted work gets to hand back what it already has before the caller gives up on it. */
export const DEFAULT_ABORT_GRACE_MS = 5_000;

/**
 * Run cancellable work under a deadline. At `timeoutMs` the signal aborts with a
 * SourceTimeoutError as its reason; the work may still resolve with a partial result.
 * Work that has not settled `graceMs` later is abandoned and the same error rejects.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  graceMs: number = DEFAULT_ABORT_GRACE_MS,
): Promise<T> {
  const controller = new AbortController();
  const reason = new SourceTimeoutError(label, timeoutMs);
  let abortTimer: NodeJS.Timeout | undefined;
  let backstopTimer: NodeJS.Timeout | undefined;

  const backstop = new Promise<never>((_resolve, reject) => {
    abortTimer = setTimeout(() => {
      controller.abort(reason);
      backstopTimer = setTimeout(() => reject(reason), graceMs);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), backstop]);
  } finally {
    clearTimeout(abortTimer);
    clearTimeout(backstopTimer);
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
