import { describe, test, expect } from 'vitest';
import { detectStock, findScarcityPhrase } from '../utils/StockParser.js';
import { defaultTextScales } from '../../config/textScales.js';

const scales = defaultTextScales();

describe('StockParser', () => {
  test('flags a small countable quantity as scarcity', () => {
    expect(detectStock('Only 2 left in stock')).toEqual({
      in_stock: true,
      scarcity_signal: 'Only 2 left in stock',
      raw_text: 'Only 2 left in stock',
    });
  });

  test('plain availability is in stock without scarcity', () => {
    expect(detectStock('In stock')).toEqual({ in_stock: true, scarcity_signal: null, raw_text: 'In stock' });
  });

  test('a count that is not a remaining quantity is not scarcity', () => {
    expect(detectStock('In stock (22 available)').scarcity_signal).toBeNull();
  });

  test.each(['Out of Stock', 'SOLD OUT', 'Currently unavailable.', 'Temporarily unavailable'])(
    '"%s" is out of stock',
    (text) => {
      expect(detectStock(text)).toEqual({ in_stock: false, scarcity_signal: null, raw_text: text });
    }
  );

  test('out-of-stock phrases win over scarcity phrases', () => {
    expect(detectStock('Sold out - only 2 left at other stores').in_stock).toBe(false);
  });

  test('recognizes other scarcity phrasings', () => {
    expect(findScarcityPhrase('Last one!', scales)).toBe('Last one');
    expect(findScarcityPhrase('Hurry, only a few left', scales)).toBe('only a few left');
    expect(findScarcityPhrase('Low stock', scales)).toBe('Low stock');
    expect(findScarcityPhrase('3 remaining', scales)).toBe('3 remaining');
  });

  test('large quantities are ordinary stock', () => {
    expect(detectStock('Over 500 left in stock')).toEqual({
      in_stock: true,
      scarcity_signal: null,
      raw_text: 'Over 500 left in stock',
    });
    expect(findScarcityPhrase('Only 25 left', scales)).toBeNull();
    expect(findScarcityPhrase('Only 10 left', scales)).toBe('Only 10 left');
  });

  test('"last" needs an item word', () => {
    expect(detectStock('Last 30 days: 1,200 sold').scarcity_signal).toBeNull();
    expect(findScarcityPhrase('Last 2 items in your size', scales)).toBe('Last 2 items');
    expect(findScarcityPhrase('Last unit available', scales)).toBe('Last unit');
  });

  test('a later small quantity still counts after a large one', () => {
    expect(findScarcityPhrase('Warehouse: 300 left, store: 2 left', scales)).toBe('2 left');
  });

  test('missing text defaults to in stock', () => {
    expect(detectStock(null)).toEqual({ in_stock: true, scarcity_signal: null, raw_text: null });
    expect(detectStock('')).toEqual({ in_stock: true, scarcity_signal: null, raw_text: null });
  });
});
