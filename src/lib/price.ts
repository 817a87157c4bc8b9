/**
 * Listing prices are stored as the display string the site served ("€12,500", "12 500 €",
 * "price on request"). Numbers are only derived on demand, through parsePriceAmount.
 */

// First run of digits, allowing thousands separators inside it.
const AMOUNT_PATTERN = /\d[\d,.' \u00a0\u202f]*/;
const SEPARATORS = /[,.' \u00a0\u202f]/g;

/**
 * Integer amount of a display price, or null when the text carries no digits.
 * Currency symbols and thousands separators are dropped: "€12,500" → 12500.
 */
export function parsePriceAmount(text: string | null | undefined): number | null {
  if (!text) return null;

  const match = AMOUNT_PATTERN.exec(text);
  if (!match) return null;

  const digits = match[0].replace(SEPARATORS, '');
  if (digits.length === 0) return null;

  const amount = Number.parseInt(digits, 10);
  return Number.isSafeInteger(amount) ? amount : null;
}

export class Price {
  private parsed = false;
  private cachedAmount: number | null = null;

  constructor(public readonly display: string | null) {}

  static of(display: string | null | undefined): Price {
    return new Price(normalizeText(display));
  }

  get amount(): number | null {
    if (!this.parsed) {
      this.cachedAmount = parsePriceAmount(this.display);
      this.parsed = true;
    }
    return this.cachedAmount;
  }

  equals(other: Price): boolean {
    return (this.display ?? '') === (other.display ?? '');
  }
}

/**
 * Trimmed text, or null when nothing is left.
 */
export function normalizeText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
