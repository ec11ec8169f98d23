import { describe, test, expect } from 'vitest';
import { buildCategorizationPrompt, computePriceStats } from '../prompt.js';

describe('prompt', () => {
  test('computePriceStats returns min, max and mean', () => {
    expect(computePriceStats([10, 20, 60])).toEqual({ min: 10, max: 60, avg: 30 });
  });

  test('computePriceStats returns null without prices', () => {
    expect(computePriceStats([])).toBeNull();
  });

  test('the prompt carries the statistics, products and categories', () => {
    const prompt = buildCategorizationPrompt({
      batch: 1,
      items: [{ id: 'books_1', name: 'Sapiens', price: 54.23, rating: 5 }],
      stats: { min: 10, max: 60, avg: 27.5 },
    });

    expect(prompt).toContain('- Min: $10.00');
    expect(prompt).toContain('- Max: $60.00');
    expect(prompt).toContain('- Average: $27.50');
    expect(prompt).toContain('"id": "books_1"');
    expect(prompt).toContain('"price": 54.23');
    expect(prompt).toContain('"category": "Budget|Mid Range|High End"');
  });
});
