import { ListingNotFoundError, SourceError, SourceHttpError, SourceTimeoutError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { RequestRateLimiter } from '../lib/rate-limiter.js';
import { sleep } from '../lib/timeout.js';

const USER_AGENT = 'Mozilla/5.0 (compatible; CarWatchWorker/1.0)';
const BASE_BACKOFF_MS = 500;

export interface FetchOptions {
  /** Aborting stops retries and any in-flight request; the signal's reason is rethrown. */
  signal?: AbortSignal;
}

export interface ClassifiedsClientOptions {
  requestTimeoutMs: number;
  maxRetries?: number;
  rateLimiter: RequestRateLimiter;
  logger: Logger;
  /** Injected in tests. */
  fetchImpl?: typeof fetch;
}

/**
 * HTTP access to the classifieds site.
 * - One rate-limited request per attempt
 * - Per-request timeout through AbortController
 * - Retries with exponential backoff + jitter on network errors, timeouts and 5xx
 * - 404/410 are final and surface as ListingNotFoundError
 */
export class ClassifiedsClient {
  private readonly fetchImpl: typeof fetch;
  private readonly maxRetries: number;

  constructor(private readonly options: ClassifiedsClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxRetries = options.maxRetries ?? 2;
  }

  async fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
    const { signal } = options;
    let lastError: SourceError | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const backoff = BASE_BACKOFF_MS * Math.pow(2, attempt - 1) + Math.random() * BASE_BACKOFF_MS;
        this.options.logger.debug({ url, attempt, backoffMs: Math.round(backoff) }, 'Retrying classifieds request');
        await sleep(backoff, signal);
      }
      signal?.throwIfAborted();

      try {
        return await this.attempt(url, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        if (err instanceof ListingNotFoundError) throw err;
        if (err instanceof SourceHttpError && err.statusCode < 500 && err.statusCode !== 429) throw err;

        lastError = err instanceof SourceError ? err : new SourceError(describeError(err), url);
        this.options.logger.warn(
          { url, attempt: attempt + 1, err: lastError.message },
          'Classifieds request failed',
        );
      }
    }

    throw lastError ?? new SourceError(`Request failed for ${url}`, url);
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<string> {
    await this.options.rateLimiter.waitForSlot(signal);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        redirect: 'follow',
      });

      if (response.status === 404 || response.status === 410) {
        throw new ListingNotFoundError(url);
      }
      if (!response.ok) {
        throw new SourceHttpError(`Classifieds request failed: ${response.status} ${response.statusText}`, url, response.status);
      }

      return await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        signal?.throwIfAborted();
        throw new SourceTimeoutError(`GET ${url}`, this.options.requestTimeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
