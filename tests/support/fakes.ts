import type { MonitorRun, RunKind, RunStatus } from '../../src/db/schema/index';
import type { FilterDefinition } from '../../src/config/filters';
import type { Notifier } from '../../src/notifications/notifier';
import type { ListingSource, RawListing, RefetchResult, SourceRequestOptions } from '../../src/source/listing-source';
import type { RunLog, RunStats } from '../../src/store/run-log';

export function createRecordingNotifier(): jest.Mocked<Notifier> {
  return {
    newListing: jest.fn().mockResolvedValue(undefined),
    priorityDigest: jest.fn().mockResolvedValue(undefined),
    listingChanged: jest.fn().mockResolvedValue(undefined),
    recheckSummary: jest.fn().mockResolvedValue(undefined),
    priceDropAlert: jest.fn().mockResolvedValue(undefined),
    error: jest.fn().mockResolvedValue(undefined),
  };
}

export class InMemoryRunLog implements RunLog {
  readonly runs: MonitorRun[] = [];

  async start(kind: RunKind): Promise<number> {
    const id = this.runs.length + 1;
    this.runs.push({
      id,
      kind,
      startedAt: new Date(),
      completedAt: null,
      status: 'running',
      errorMessage: null,
      stats: null,
    });
    return id;
  }

  async finish(runId: number, status: Exclude<RunStatus, 'running'>, stats: RunStats, error?: string): Promise<void> {
    const run = this.runs.find((r) => r.id === runId);
    if (!run) throw new Error(`Unknown run ${runId}`);
    run.completedAt = new Date();
    run.status = status;
    run.stats = stats;
    run.errorMessage = error ?? null;
  }

  async lastRuns(): Promise<Partial<Record<RunKind, MonitorRun>>> {
    const result: Partial<Record<RunKind, MonitorRun>> = {};
    for (const run of this.runs) {
      if (run.status !== 'running') result[run.kind] = run;
    }
    return result;
  }
}

/**
 * Source scripted per filter name and per link. Records every scrape call.
 */
export class StubSource implements ListingSource {
  readonly scrapes: { filter: string; knownLinks: string[] }[] = [];
  readonly refetches: string[] = [];
  private readonly listings = new Map<string, RawListing[] | Error>();
  private readonly pages = new Map<string, RefetchResult | Error>();

  setListings(filterName: string, result: RawListing[] | Error): this {
    this.listings.set(filterName, result);
    return this;
  }

  setPage(link: string, result: RefetchResult | Error): this {
    this.pages.set(link, result);
    return this;
  }

  async scrape(
    filter: FilterDefinition,
    knownLinks: ReadonlySet<string>,
    _options?: SourceRequestOptions,
  ): Promise<RawListing[]> {
    this.scrapes.push({ filter: filter.name, knownLinks: [...knownLinks].sort() });
    const result = this.listings.get(filter.name) ?? [];
    if (result instanceof Error) throw result;
    return result.map((r) => ({ ...r }));
  }

  async refetch(link: string, _options?: SourceRequestOptions): Promise<RefetchResult> {
    this.refetches.push(link);
    const result = this.pages.get(link);
    if (result === undefined) throw new Error(`No page scripted for ${link}`);
    if (result instanceof Error) throw result;
    return result;
  }
}

export function found(price: string | null, description: string | null, title: string | null = null): RefetchResult {
  return { kind: 'found', snapshot: { price, description, title } };
}
