// ============================================================================
// PRODUCT PARSER
// ============================================================================
// Turns one container's raw field text into product fields. Every field is
// handled on its own: a bad price never costs the record its name or rating.

import type { ProductField, ProductRecord } from '../../shared/types.js';
import type { RawContainer } from './utils/ContainerReader.js';
import { normalizePrice } from './utils/PriceParser.js';
import { normalizeRating } from './utils/RatingParser.js';
import { detectStock } from './utils/StockParser.js';
import { ExtractionFieldError } from './types/errors.js';
import { defaultTextScales, type TextScales } from '../config/textScales.js';

/** Product fields before the run assigns id, source and timestamp */
export type ParsedProduct = Omit<ProductRecord, 'id' | 'source' | 'source_url' | 'scraped_at'>;

export interface ParseResult {
  /** null when the container has no usable name */
  product: ParsedProduct | null;
  errors: ExtractionFieldError[];
}

function missingReason(container: RawContainer, field: ProductField): string {
  const failure = container.failures[field];
  return failure ? `lookup failed (${failure})` : 'missing';
}

export function parseContainer(container: RawContainer, scales: TextScales = defaultTextScales()): ParseResult {
  const errors: ExtractionFieldError[] = [];
  const raw = (field: ProductField): string | null => container.values[field] ?? null;

  const name = raw('name');
  if (!name) {
    errors.push(new ExtractionFieldError(container.index, 'name', `${missingReason(container, 'name')}, container skipped`));
    return { product: null, errors };
  }

  const priceRaw = raw('price');
  const price = normalizePrice(priceRaw);
  if (priceRaw === null) {
    errors.push(new ExtractionFieldError(container.index, 'price', missingReason(container, 'price')));
  } else if (price === null) {
    errors.push(new ExtractionFieldError(container.index, 'price', 'unparsable', priceRaw));
  }

  const ratingRaw = raw('rating');
  const rating = normalizeRating(ratingRaw, scales);
  if (ratingRaw === null) {
    errors.push(new ExtractionFieldError(container.index, 'rating', missingReason(container, 'rating')));
  } else if (rating === null) {
    errors.push(new ExtractionFieldError(container.index, 'rating', 'unparsable', ratingRaw));
  }

  const availabilityRaw = raw('availability');
  if (availabilityRaw === null) {
    errors.push(new ExtractionFieldError(container.index, 'availability', missingReason(container, 'availability')));
  }

  return {
    product: {
      name,
      price,
      price_raw: priceRaw,
      rating,
      rating_raw: ratingRaw,
      stock_info: detectStock(availabilityRaw, scales),
    },
    errors,
  };
}
