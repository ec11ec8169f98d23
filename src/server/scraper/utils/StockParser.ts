// ============================================================================
// STOCK PARSER UTILITY
// ============================================================================
// Availability text → in_stock flag plus scarcity signal

import type { StockInfo } from '../../../shared/types.js';
import { defaultTextScales, type TextScales } from '../../config/textScales.js';

export function isOutOfStock(text: string, scales: TextScales): boolean {
  const lower = text.toLowerCase();
  return scales.outOfStockPhrases.some((phrase) => lower.includes(phrase.toLowerCase()));
}

const COUNT_REGEX = /\d+/;

/**
 * First scarcity phrase in the text whose quantity, if any, is at most
 * `maxScarcityCount`
 */
export function findScarcityPhrase(text: string, scales: TextScales): string | null {
  for (const pattern of scales.scarcityPatterns) {
    for (const match of text.matchAll(new RegExp(pattern, 'gi'))) {
      const count = COUNT_REGEX.exec(match[0]);
      if (count && parseInt(count[0], 10) > scales.maxScarcityCount) continue;
      return match[0];
    }
  }
  return null;
}

/**
 * Unrecognized or missing text counts as in stock with no scarcity signal.
 * When scarcity is detected the whole availability text is kept as the signal.
 */
export function detectStock(
  text: string | null | undefined,
  scales: TextScales = defaultTextScales()
): StockInfo {
  if (!text) {
    return { in_stock: true, scarcity_signal: null, raw_text: null };
  }

  if (isOutOfStock(text, scales)) {
    return { in_stock: false, scarcity_signal: null, raw_text: text };
  }

  const scarcity = findScarcityPhrase(text, scales);
  return {
    in_stock: true,
    scarcity_signal: scarcity ? text : null,
    raw_text: text,
  };
}
