// ============================================================================
// PRICE PARSER UTILITY
// ============================================================================
// Extracts and parses prices from text with support for multiple currencies
// and formats (comma/dot as decimal separator, currency symbols, etc.)

/**
 * Numeric price bodies: 25.45, 1,234.56, 1.234,56, 1234.56, 19,99
 */
const PRICE_REGEX = /\d+(?:[,.]\d{3})*(?:[,.]\d{1,2})?/g;

/**
 * Digit groups split by a space, no-break space or apostrophe:
 * 1 234,56 (fr-FR), 1'234.50 (de-CH)
 */
const SPACED_GROUPS_REGEX = /(?<!\d)\d{1,3}(?:[ \u00a0\u2009\u202f'\u2019]\d{3})+(?!\d)/g;
const GROUP_SEPARATOR_REGEX = /[ \u00a0\u2009\u202f'\u2019]/g;

function joinDigitGroups(text: string): string {
  return text.replace(SPACED_GROUPS_REGEX, (match) => match.replace(GROUP_SEPARATOR_REGEX, ''));
}

/**
 * Parsed price with original string and numeric value
 */
export interface ParsedPrice {
  /** Numeric body as found in the text */
  original: string;
  value: number;
}

/**
 * Parse a price string into a numeric value
 * Handles various formats:
 * - £25.99 → 25.99
 * - €19,99 → 19.99 (European format)
 * - $1,234.56 → 1234.56
 * - 25.45 MAD → 25.45
 *
 * @returns Numeric value, or NaN if parsing fails
 */
export function parsePrice(priceStr: string | null | undefined): number {
  if (!priceStr) return NaN;

  // Remove currency symbols and whitespace
  let cleaned = priceStr
    .replace(/[£$€¥₹]/g, '')
    .replace(/\s*(MAD|USD|EUR|GBP|JPY|INR)\s*/gi, '')
    .trim();

  // Comma followed by 1-2 trailing digits is a decimal separator
  if (/,(\d{1,2})$/.test(cleaned)) {
    cleaned = cleaned.replace(/,(\d{1,2})$/, '.$1');
  }

  // Remaining commas are thousands separators
  cleaned = cleaned.replace(/,/g, '');

  // Multiple dots: only the last one is the decimal point
  const parts = cleaned.split('.');
  if (parts.length > 2) {
    cleaned = parts.slice(0, -1).join('') + '.' + parts[parts.length - 1];
  }

  return parseFloat(cleaned);
}

/**
 * Extract every numeric price body from a text string
 */
export function extractAllPrices(text: string | null | undefined): ParsedPrice[] {
  if (!text) return [];

  const matches = joinDigitGroups(text).match(PRICE_REGEX);
  if (!matches) return [];

  return matches
    .map((match) => ({ original: match, value: parsePrice(match) }))
    .filter((p) => Number.isFinite(p.value) && p.value >= 0);
}

/**
 * Normalize a listing's price text to a number.
 * When several prices are shown ("Was £50 Now £35") the lowest is the
 * current price. Returns null when no numeric body is present.
 */
export function normalizePrice(text: string | null | undefined): number | null {
  const prices = extractAllPrices(text);
  if (prices.length === 0) return null;

  return prices.reduce((lowest, p) => (p.value < lowest ? p.value : lowest), prices[0].value);
}

/**
 * Format a price value with currency symbol
 */
export function formatPrice(value: number, currency: string = '$'): string {
  if (isNaN(value)) return '';

  const formatted = value.toFixed(2);

  // Put currency before or after based on convention
  const suffixCurrencies = ['MAD'];
  if (suffixCurrencies.includes(currency)) {
    return `${formatted} ${currency}`;
  }

  return `${currency}${formatted}`;
}
