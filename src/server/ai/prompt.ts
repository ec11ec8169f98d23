import type { CategorizationItem, CategorizationRequest, PriceStats } from './types.js';
import { PRODUCT_CATEGORIES } from '../../shared/types.js';

export const SYSTEM_PROMPT = 'You are an expert e-commerce data analyst.';

export function computePriceStats(prices: readonly number[]): PriceStats | null {
  if (prices.length === 0) return null;

  let min = prices[0];
  let max = prices[0];
  let sum = 0;
  for (const price of prices) {
    if (price < min) min = price;
    if (price > max) max = price;
    sum += price;
  }

  return { min, max, avg: sum / prices.length };
}

function summarize(items: readonly CategorizationItem[]): string {
  return JSON.stringify(
    items.map(({ id, name, price, rating }) => ({ id, name, price, rating })),
    null,
    2
  );
}

export function buildCategorizationPrompt(request: CategorizationRequest): string {
  const { stats } = request;
  const categories = PRODUCT_CATEGORIES.join('|');

  return `Analyze these e-commerce products and categorize each into a pricing tier.

PRICE STATISTICS:
- Min: $${stats.min.toFixed(2)}
- Max: $${stats.max.toFixed(2)}
- Average: $${stats.avg.toFixed(2)}

PRODUCTS:
${summarize(request.items)}

TASK:
For each product, determine its category based on:
1. Price relative to the range
2. Rating (if available)
3. Product name/features

CATEGORIES:
- "Budget" - Lower-priced options (typically below average)
- "Mid Range" - Moderately priced (around average)
- "High End" - Premium/expensive (well above average)

Respond ONLY with valid JSON in this exact format:
{
  "categorizations": [
    {
      "id": "product_id",
      "category": "${categories}",
      "reasoning": "brief explanation"
    }
  ]
}`;
}
