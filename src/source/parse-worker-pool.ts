import path from 'node:path';
import { Worker } from 'node:worker_threads';
import type { FilterDefinition } from '../config/filters.js';
import { ListingNotFoundError, SourceError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { HtmlParser, ParseRequest, ParseResponse } from './html-parser.js';
import type { ListingSnapshot, RawListing } from './listing-source.js';

type RequestBody =
  | { kind: 'search'; html: string; filter: FilterDefinition; baseUrl: string }
  | { kind: 'listing'; html: string; url: string };

interface Pending {
  resolve: (response: ParseResponse) => void;
  reject: (err: Error) => void;
  url: string;
}

interface Slot {
  worker: Worker;
  pending: Map<number, Pending>;
}

export interface ParseWorkerPoolOptions {
  size: number;
  logger: Logger;
  /** Compiled worker entry; defaults to parse-worker.js beside this file. */
  workerFile?: string;
}

/**
 * Keeps cheerio off the scheduler's event loop. Requests are spread round-robin across
 * `size` worker threads; a worker that dies fails its in-flight requests and is replaced
 * on the next request.
 */
export class ParseWorkerPool implements HtmlParser {
  private readonly slots: (Slot | null)[];
  private readonly workerFile: string;
  private nextId = 1;
  private cursor = 0;
  private closed = false;

  constructor(private readonly options: ParseWorkerPoolOptions) {
    this.slots = Array.from({ length: Math.max(1, options.size) }, () => null);
    this.workerFile = options.workerFile ?? path.join(__dirname, 'parse-worker.js');
  }

  async searchResults(html: string, filter: FilterDefinition, baseUrl: string): Promise<RawListing[]> {
    const response = await this.dispatch({ kind: 'search', html, filter, baseUrl }, baseUrl);
    if (response.ok && response.kind === 'search') return response.listings;
    throw toError(response, baseUrl);
  }

  async listingPage(html: string, url: string): Promise<ListingSnapshot> {
    const response = await this.dispatch({ kind: 'listing', html, url }, url);
    if (response.ok && response.kind === 'listing') return response.snapshot;
    throw toError(response, url);
  }

  async close(): Promise<void> {
    this.closed = true;
    const running = this.slots.filter((slot): slot is Slot => slot !== null);
    this.slots.fill(null);
    await Promise.all(running.map((slot) => slot.worker.terminate()));
    this.options.logger.info({ workers: running.length }, 'Parse workers stopped');
  }

  private dispatch(body: RequestBody, url: string): Promise<ParseResponse> {
    if (this.closed) {
      return Promise.reject(new SourceError('Parse worker pool is closed', url));
    }

    const index = this.cursor;
    this.cursor = (this.cursor + 1) % this.slots.length;
    const slot = this.slots[index] ?? this.spawn(index);

    const id = this.nextId++;
    const request: ParseRequest = { ...body, id };

    return new Promise<ParseResponse>((resolve, reject) => {
      slot.pending.set(id, { resolve, reject, url });
      slot.worker.postMessage(request);
    });
  }

  private spawn(index: number): Slot {
    const worker = new Worker(this.workerFile);
    const slot: Slot = { worker, pending: new Map() };

    worker.on('message', (response: ParseResponse) => {
      const pending = slot.pending.get(response.id);
      if (!pending) return;
      slot.pending.delete(response.id);
      pending.resolve(response);
    });

    const fail = (err: Error) => {
      for (const pending of slot.pending.values()) {
        pending.reject(new SourceError(`Parse worker failed: ${err.message}`, pending.url));
      }
      slot.pending.clear();
      if (this.slots[index] === slot) this.slots[index] = null;
    };

    worker.on('error', (err) => {
      this.options.logger.error({ err, worker: index }, 'Parse worker crashed');
      fail(err);
    });
    worker.on('exit', (code) => {
      if (slot.pending.size > 0) fail(new Error(`exited with code ${code}`));
      if (this.slots[index] === slot) this.slots[index] = null;
    });

    this.slots[index] = slot;
    this.options.logger.debug({ worker: index }, 'Parse worker started');
    return slot;
  }
}

function toError(response: ParseResponse, url: string): Error {
  if (response.ok) {
    return new SourceError(`Unexpected parse response of kind ${response.kind}`, url);
  }
  if (response.error.name === 'ListingNotFoundError') {
    return new ListingNotFoundError(url);
  }
  return new SourceError(`Parse failed: ${response.error.message}`, url);
}
