import { NotificationError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ListingChange, RecheckSummary } from '../pipeline/change-detection.js';
import type { PriceDrop } from '../pipeline/price-drops.js';
import type { Listing } from '../store/listing-store.js';
import {
  formatChange,
  formatError,
  formatNewListing,
  formatPriceDrops,
  formatPriorityDigest,
  formatRecheckSummary,
  type NewListingOptions,
  type Notifier,
} from './notifier.js';

// Bot API rejects texts over 4096 characters
const MAX_MESSAGE_LENGTH = 4000;

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  apiBaseUrl: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

function cutLine(line: string, maxLength: number): string[] {
  if (line.length <= maxLength) return [line];
  const pieces: string[] = [];
  for (let start = 0; start < line.length; start += maxLength) {
    pieces.push(line.slice(start, start + maxLength));
  }
  return pieces;
}

/**
 * Splits on line boundaries so HTML tags opened on a line are closed in the same chunk.
 * A single line longer than `maxLength` is cut into `maxLength` pieces.
 */
export function splitMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let current = '';
  for (const line of text.split('\n').flatMap((l) => cutLine(l, maxLength))) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > maxLength && current) {
      chunks.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export class TelegramNotifier implements Notifier {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: TelegramNotifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger.child({ component: 'telegram' });
  }

  async newListing(listing: Listing, options: NewListingOptions): Promise<void> {
    await this.send(formatNewListing(listing, options));
  }

  async priorityDigest(listings: readonly Listing[]): Promise<void> {
    await this.send(formatPriorityDigest(listings));
  }

  async listingChanged(listing: Listing, change: ListingChange): Promise<void> {
    await this.send(formatChange(listing, change));
  }

  async recheckSummary(summary: RecheckSummary): Promise<void> {
    await this.send(formatRecheckSummary(summary));
  }

  async priceDropAlert(drops: readonly PriceDrop[], thresholdEuros: number): Promise<void> {
    await this.send(formatPriceDrops(drops, thresholdEuros));
  }

  async error(message: string, context?: Record<string, unknown>): Promise<void> {
    try {
      await this.send(formatError(message, context));
    } catch (err) {
      this.logger.error({ err: describeError(err), message }, 'Failed to deliver error notification');
    }
  }

  private async send(text: string): Promise<void> {
    const url = `${this.options.apiBaseUrl}/bot${this.options.botToken}/sendMessage`;

    for (const chunk of splitMessage(text)) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            chat_id: this.options.chatId,
            text: chunk,
            parse_mode: 'HTML',
            disable_web_page_preview: true,
          }),
        });
      } catch (err) {
        throw new NotificationError(`Telegram request failed: ${describeError(err)}`);
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new NotificationError(
          `Telegram sendMessage failed: ${response.status} ${body}`.trim(),
          response.status,
        );
      }
    }

    this.logger.debug({ length: text.length }, 'Telegram message sent');
  }
}
