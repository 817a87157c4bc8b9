import type { ListingChange, RecheckSummary } from '../pipeline/change-detection.js';
import type { PriceDrop } from '../pipeline/price-drops.js';
import type { Listing } from '../store/listing-store.js';

export interface NewListingOptions {
  priority: boolean;
}

/**
 * Outbound events. Every method may throw except `error`, which is the last resort
 * channel and swallows its own delivery failures.
 */
export interface Notifier {
  newListing(listing: Listing, options: NewListingOptions): Promise<void>;
  priorityDigest(listings: readonly Listing[]): Promise<void>;
  listingChanged(listing: Listing, change: ListingChange): Promise<void>;
  recheckSummary(summary: RecheckSummary): Promise<void>;
  priceDropAlert(drops: readonly PriceDrop[], thresholdEuros: number): Promise<void>;
  error(message: string, context?: Record<string, unknown>): Promise<void>;
}

// ─── Formatting ──────────────────────────────────────────────────────────────
// Telegram HTML parse mode: only &, < and > need escaping in text nodes; quotes too inside href.

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function orDash(value: string | number | null | undefined): string {
  return value === null || value === undefined || value === '' ? '-' : escapeHtml(String(value));
}

function formatMileage(mileage: number | null): string {
  return mileage === null ? '-' : `${mileage.toLocaleString('en-US')} km`;
}

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max - 1)}…`;
}

export function formatNewListing(listing: Listing, options: NewListingOptions): string {
  const header = options.priority ? '🔥 <b>Priority listing</b>' : '🚗 <b>New listing</b>';
  return [
    header,
    `<a href="${escapeHtml(listing.link)}">${escapeHtml(listing.title)}</a>`,
    `Price: ${orDash(listing.price)}`,
    `Year: ${orDash(listing.year)} · Mileage: ${formatMileage(listing.mileage)}`,
    `Place: ${orDash(listing.place)} · Posted: ${orDash(listing.datePosted)}`,
    `Filter: ${orDash(listing.filterName)}`,
  ].join('\n');
}

export function formatPriorityDigest(listings: readonly Listing[]): string {
  const lines = listings.map(
    (l) => `• <a href="${escapeHtml(l.link)}">${escapeHtml(l.title)}</a> (${orDash(l.price)})`,
  );
  return [`🔥 <b>${listings.length} new priority listing${listings.length === 1 ? '' : 's'}</b>`, ...lines].join('\n');
}

export function formatChange(listing: Listing, change: ListingChange): string {
  const lines = [
    '✏️ <b>Listing changed</b>',
    `<a href="${escapeHtml(listing.link)}">${escapeHtml(listing.title)}</a>`,
  ];
  if (change.price) {
    lines.push(`Price: ${orDash(change.price.old)} → ${escapeHtml(change.price.new)}`);
  }
  if (change.description) {
    lines.push(`Description updated:\n<i>${escapeHtml(truncate(change.description.new, 300))}</i>`);
  }
  return lines.join('\n');
}

export function formatRecheckSummary(summary: RecheckSummary): string {
  return [
    '📊 <b>Daily recheck</b>',
    `Checked: ${summary.checked}`,
    `Changed: ${summary.changed} (price ${summary.priceChanges}, description ${summary.descriptionChanges})`,
    `Unavailable: ${summary.unavailable}`,
    `Errors: ${summary.errors}`,
    `Elapsed: ${Math.round(summary.elapsedMs / 1000)}s`,
  ].join('\n');
}

export function formatPriceDrops(drops: readonly PriceDrop[], thresholdEuros: number): string {
  const lines = drops.map(
    (d) =>
      `• <a href="${escapeHtml(d.listing.link)}">${escapeHtml(d.listing.title)}</a>\n` +
      `  €${d.previousAmount.toLocaleString('en-US')} → €${d.currentAmount.toLocaleString('en-US')} ` +
      `(−€${d.dropAmount.toLocaleString('en-US')}, ${d.dropPercent}%)`,
  );
  return [`📉 <b>Price drops over €${thresholdEuros.toLocaleString('en-US')}</b>`, ...lines].join('\n');
}

export function formatError(message: string, context?: Record<string, unknown>): string {
  const details = context && Object.keys(context).length > 0 ? `\n<code>${escapeHtml(JSON.stringify(context))}</code>` : '';
  return `⚠️ <b>Error</b>\n${escapeHtml(message)}${details}`;
}
