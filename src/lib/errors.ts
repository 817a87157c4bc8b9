// ─── Listing Source ──────────────────────────────────────────────────────────

export class SourceError extends Error {
  constructor(
    message: string,
    public readonly url?: string,
  ) {
    super(message);
    this.name = 'SourceError';
  }
}

export class SourceHttpError extends SourceError {
  constructor(
    message: string,
    url: string,
    public readonly statusCode: number,
  ) {
    super(message, url);
    this.name = 'SourceHttpError';
  }
}

export class SourceTimeoutError extends SourceError {
  constructor(
    label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'SourceTimeoutError';
  }
}

/**
 * The listing no longer exists at its link (404/410 or a "removed" page).
 */
export class ListingNotFoundError extends SourceError {
  constructor(url: string) {
    super(`Listing not found: ${url}`, url);
    this.name = 'ListingNotFoundError';
  }
}

// ─── Notifications ───────────────────────────────────────────────────────────

export class NotificationError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'NotificationError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

// ─── Scheduling ──────────────────────────────────────────────────────────────

export class TaskInProgressError extends Error {
  public readonly statusCode = 409;

  constructor(public readonly task: string) {
    super(`${task} is already running`);
    this.name = 'TaskInProgressError';
  }
}
