import { z } from 'zod';

import type { Categorization, CategorizationResponse } from './types.js';
import { PipelineError, ScrapeErrorType } from '../scraper/types/errors.js';

const EntrySchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  category: z.string(),
  reasoning: z.string().optional().default(''),
});

const BodySchema = z.union([
  z.object({ categorizations: z.array(z.unknown()) }).transform((body) => body.categorizations),
  z.array(z.unknown()),
]);

/**
 * Strip markdown fences and locate the JSON value in a model reply
 */
export function extractJson(text: string): unknown {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  cleaned = cleaned.trim();

  try {
    return JSON.parse(cleaned);
  } catch {
    // Prose around the payload: take the outermost object
    const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
    if (jsonMatch) {
      try {
        return JSON.parse(jsonMatch[0]);
      } catch (error) {
        throw new PipelineError('Provider response contains malformed JSON', ScrapeErrorType.PARSE, { cause: error });
      }
    }
    throw new PipelineError('No valid JSON found in provider response', ScrapeErrorType.PARSE);
  }
}

/**
 * Parse a provider reply into categorizations. Throws a PARSE PipelineError
 * when the body as a whole is unusable; malformed individual entries are
 * dropped so the engine reports them as missing.
 */
export function parseCategorizationResponse(text: string): CategorizationResponse {
  const body = BodySchema.safeParse(extractJson(text));
  if (!body.success) {
    throw new PipelineError('Provider response has no categorizations list', ScrapeErrorType.PARSE);
  }

  const entries: Categorization[] = [];
  for (const raw of body.data) {
    const entry = EntrySchema.safeParse(raw);
    if (entry.success) {
      entries.push({
        id: entry.data.id,
        category: entry.data.category.trim(),
        reasoning: entry.data.reasoning.trim(),
      });
    }
  }

  return { entries };
}
