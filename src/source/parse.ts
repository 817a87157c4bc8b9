import * as cheerio from 'cheerio';
import type { FilterDefinition } from '../config/filters.js';
import { ListingNotFoundError } from '../lib/errors.js';
import { normalizeText } from '../lib/price.js';
import type { ListingSnapshot, RawListing } from './listing-source.js';

const MILEAGE_PATTERN = /([\d,. ]+)\s*km/;
const YEAR_PATTERN = /(19\d{2}|20\d{2})/;
const REMOVED_MARKERS = '.announcement-not-found, .not-found';

function collapseWhitespace(value: string): string | null {
  return normalizeText(value.replace(/\s+/g, ' '));
}

/**
 * Absolute link with query string and fragment removed. null when the href is unusable.
 */
export function canonicalizeLink(href: string, baseUrl: string): string | null {
  let url: URL;
  try {
    url = new URL(href, baseUrl);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
  url.search = '';
  url.hash = '';
  return url.toString();
}

export function parseMileage(text: string): number | null {
  const match = MILEAGE_PATTERN.exec(text.toLowerCase());
  if (!match) return null;
  const digits = match[1].replace(/[,. ]/g, '');
  if (digits.length === 0) return null;
  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export function parseYear(text: string): number | null {
  const match = YEAR_PATTERN.exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * A known year below the minimum, or a known mileage above the maximum, fails the filter.
 * Unknown values pass.
 */
export function withinFilterBounds(
  listing: Pick<RawListing, 'year' | 'mileage'>,
  filter: Pick<FilterDefinition, 'minYear' | 'maxMileage' | 'relaxed'>,
): boolean {
  if (filter.relaxed) return true;
  if (listing.year !== null && listing.year < filter.minYear) return false;
  if (listing.mileage !== null && listing.mileage > filter.maxMileage) return false;
  return true;
}

/**
 * Cards of one search results page. Descriptions are not on this page and stay null.
 */
export function parseSearchResults(html: string, filter: FilterDefinition, baseUrl: string): RawListing[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const results: RawListing[] = [];

  $('div.advert.js-item-listing').each((_index, element) => {
    const card = $(element);

    const titleTag = card.find('a.advert__content-title').first();
    const href = titleTag.attr('href');
    const title = collapseWhitespace(titleTag.text());
    if (!href || !title) return;

    const link = canonicalizeLink(href, baseUrl);
    if (!link || seen.has(link)) return;

    const features: string[] = [];
    let mileage: number | null = null;
    let year: number | null = null;

    for (const featureElement of card.find('.advert__content-feature').toArray()) {
      const text = collapseWhitespace($(featureElement).text());
      if (!text) continue;
      features.push(text);
      mileage = parseMileage(text) ?? mileage;
      year = parseYear(text) ?? year;
    }

    const raw: RawListing = {
      title,
      link,
      brand: filter.brand,
      price: collapseWhitespace(card.find('a.advert__content-price').first().text()),
      year: year ?? parseYear(title),
      mileage,
      features: features.length > 0 ? features.join(' | ') : null,
      description: null,
      datePosted: collapseWhitespace(card.find('.advert__content-date').first().text()),
      place: collapseWhitespace(card.find('.advert__content-place').first().text()),
    };

    if (!withinFilterBounds(raw, filter)) return;

    seen.add(link);
    results.push(raw);
  });

  return results;
}

/**
 * Current state of one listing page. Throws ListingNotFoundError on a removed-listing page.
 */
export function parseListingPage(html: string, url = ''): ListingSnapshot {
  const $ = cheerio.load(html);

  if ($(REMOVED_MARKERS).length > 0) {
    throw new ListingNotFoundError(url);
  }

  let descriptionNode = $('.js-description').first();
  if (descriptionNode.length === 0) {
    descriptionNode = $('.announcement-description').first();
  }

  return {
    title: collapseWhitespace($('h1').first().text()),
    price: collapseWhitespace($('.announcement-price__cost').first().text()),
    description: normalizeText(descriptionNode.text()),
  };
}
