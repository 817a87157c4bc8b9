import type { FilterDefinition } from '../config/filters.js';

/**
 * One card as the classifieds site served it. `link` is already canonical.
 */
export interface RawListing {
  title: string;
  link: string;
  brand: string | null;
  price: string | null;
  year: number | null;
  mileage: number | null;
  features: string | null;
  description: string | null;
  datePosted: string | null;
  place: string | null;
}

export interface ListingSnapshot {
  title: string | null;
  price: string | null;
  description: string | null;
}

export type RefetchResult =
  | { kind: 'found'; snapshot: ListingSnapshot }
  | { kind: 'not_found' };

export interface SourceRequestOptions {
  signal?: AbortSignal;
}

export interface ListingSource {
  /**
   * Search one filter. `knownLinks` only lets the source skip detail-page fetches;
   * callers still check existence themselves.
   * Once `signal` aborts, cards still missing their detail page come back with a null description.
   */
  scrape(filter: FilterDefinition, knownLinks: ReadonlySet<string>, options?: SourceRequestOptions): Promise<RawListing[]>;

  refetch(link: string, options?: SourceRequestOptions): Promise<RefetchResult>;

  close?(): Promise<void>;
}
