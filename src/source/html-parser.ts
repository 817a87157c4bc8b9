import type { FilterDefinition } from '../config/filters.js';
import type { ListingSnapshot, RawListing } from './listing-source.js';
import { parseListingPage, parseSearchResults } from './parse.js';

export interface HtmlParser {
  searchResults(html: string, filter: FilterDefinition, baseUrl: string): Promise<RawListing[]>;
  listingPage(html: string, url: string): Promise<ListingSnapshot>;
  close(): Promise<void>;
}

export type ParseRequest =
  | { id: number; kind: 'search'; html: string; filter: FilterDefinition; baseUrl: string }
  | { id: number; kind: 'listing'; html: string; url: string };

export type ParseResponse =
  | { id: number; ok: true; kind: 'search'; listings: RawListing[] }
  | { id: number; ok: true; kind: 'listing'; snapshot: ListingSnapshot }
  | { id: number; ok: false; error: { name: string; message: string } };

/**
 * Parses on the calling thread. Used by tests and `SOURCE_PARSE_MODE=inline`.
 */
export class InlineHtmlParser implements HtmlParser {
  async searchResults(html: string, filter: FilterDefinition, baseUrl: string): Promise<RawListing[]> {
    return parseSearchResults(html, filter, baseUrl);
  }

  async listingPage(html: string, url: string): Promise<ListingSnapshot> {
    return parseListingPage(html, url);
  }

  async close(): Promise<void> {}
}

/**
 * Runs one parse request. Shared by the worker thread and its tests.
 */
export function handleParseRequest(request: ParseRequest): ParseResponse {
  try {
    if (request.kind === 'search') {
      const listings = parseSearchResults(request.html, request.filter, request.baseUrl);
      return { id: request.id, ok: true, kind: 'search', listings };
    }
    const snapshot = parseListingPage(request.html, request.url);
    return { id: request.id, ok: true, kind: 'listing', snapshot };
  } catch (err) {
    const error = err instanceof Error
      ? { name: err.name, message: err.message }
      : { name: 'Error', message: String(err) };
    return { id: request.id, ok: false, error };
  }
}
