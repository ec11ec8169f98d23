// ============================================================================
// RATING PARSER UTILITY
// ============================================================================
// Normalizes free-text and symbolic ratings onto the configured 1-5 scale:
// "4.5 out of 5 stars", "8/10", "★★★★☆", "star-rating Three"

import { defaultTextScales, type TextScales } from '../../config/textScales.js';

const RATIO_REGEX = /(\d+(?:[.,]\d+)?)\s*(?:out of|of|\/)\s*(\d+(?:[.,]\d+)?)/i;
const NUMBER_REGEX = /\d+(?:[.,]\d+)?/;

function toNumber(text: string): number {
  return parseFloat(text.replace(',', '.'));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function countOccurrences(text: string, symbol: string): number {
  return text.split(symbol).length - 1;
}

/**
 * Rating expressed as "x out of y" or "x/y", rescaled to the configured maximum
 */
export function parseRatioRating(text: string, scaleMax: number): number | null {
  const match = text.match(RATIO_REGEX);
  if (!match) return null;

  const value = toNumber(match[1]);
  const outOf = toNumber(match[2]);
  if (!(outOf > 0) || value < 0 || value > outOf) return null;

  return outOf === scaleMax ? value : round2((value / outOf) * scaleMax);
}

/**
 * Count filled (and half) star symbols
 */
export function parseSymbolRating(text: string, scales: TextScales): number | null {
  const filled = scales.ratingSymbols.filled.reduce((sum, s) => sum + countOccurrences(text, s), 0);
  const half = scales.ratingSymbols.half.reduce((sum, s) => sum + countOccurrences(text, s), 0);
  if (filled === 0 && half === 0) return null;

  return Math.min(filled + half * 0.5, scales.ratingScaleMax);
}

/**
 * First word-number in the text ("Three" → 3)
 */
export function parseWordRating(text: string, scales: TextScales): number | null {
  let best: { index: number; value: number } | null = null;

  for (const [word, value] of Object.entries(scales.ratingWords)) {
    const match = new RegExp(`\\b${word}\\b`, 'i').exec(text);
    if (match && (best === null || match.index < best.index)) {
      best = { index: match.index, value };
    }
  }

  return best ? best.value : null;
}

/**
 * Normalize rating text. Returns null for absent or unparsable input,
 * including bare numbers above the scale maximum.
 */
export function normalizeRating(
  text: string | null | undefined,
  scales: TextScales = defaultTextScales()
): number | null {
  if (!text) return null;

  const max = scales.ratingScaleMax;

  const ratio = parseRatioRating(text, max);
  if (ratio !== null) return ratio;

  const numeric = text.match(NUMBER_REGEX);
  if (numeric) {
    const value = toNumber(numeric[0]);
    return value >= 0 && value <= max ? value : null;
  }

  const symbolic = parseSymbolRating(text, scales);
  if (symbolic !== null) return symbolic;

  return parseWordRating(text, scales);
}
