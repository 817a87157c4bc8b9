import type { FilterDefinition } from '../config/filters.js';
import { ListingNotFoundError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ClassifiedsClient } from './classifieds-client.js';
import type { HtmlParser } from './html-parser.js';
import type { ListingSource, RawListing, RefetchResult, SourceRequestOptions } from './listing-source.js';

export interface ClassifiedsSourceOptions {
  client: ClassifiedsClient;
  parser: HtmlParser;
  baseUrl: string;
  logger: Logger;
}

export class ClassifiedsSource implements ListingSource {
  private readonly logger: Logger;

  constructor(private readonly options: ClassifiedsSourceOptions) {
    this.logger = options.logger.child({ component: 'classifieds-source' });
  }

  async scrape(
    filter: FilterDefinition,
    knownLinks: ReadonlySet<string>,
    options: SourceRequestOptions = {},
  ): Promise<RawListing[]> {
    const { signal } = options;
    const html = await this.options.client.fetchHtml(filter.url, { signal });
    const cards = await this.options.parser.searchResults(html, filter, this.options.baseUrl);

    const unknown = cards.filter((card) => !knownLinks.has(card.link));
    this.logger.info(
      { filter: filter.name, cards: cards.length, unknown: unknown.length },
      'Search page parsed',
    );

    // Detail pages are fetched for unknown links only
    for (const [index, card] of unknown.entries()) {
      if (signal?.aborted) {
        this.logger.warn(
          { filter: filter.name, described: index, skipped: unknown.length - index },
          'Deadline reached; remaining cards kept without descriptions',
        );
        break;
      }
      card.description = await this.fetchDescription(card.link, signal);
    }

    return cards;
  }

  async refetch(link: string, options: SourceRequestOptions = {}): Promise<RefetchResult> {
    try {
      const html = await this.options.client.fetchHtml(link, { signal: options.signal });
      const snapshot = await this.options.parser.listingPage(html, link);
      return { kind: 'found', snapshot };
    } catch (err) {
      if (err instanceof ListingNotFoundError) return { kind: 'not_found' };
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.options.parser.close();
  }

  private async fetchDescription(link: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const html = await this.options.client.fetchHtml(link, { signal });
      const snapshot = await this.options.parser.listingPage(html, link);
      return snapshot.description;
    } catch (err) {
      if (signal?.aborted) return null;
      this.logger.warn({ link, err: describeError(err) }, 'Description fetch failed; card kept without it');
      return null;
    }
  }
}
