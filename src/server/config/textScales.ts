/**
 * Phrase sets and scales used by the rating and stock heuristics.
 * Kept in configs/text-scales.json so they can grow without touching the parsers.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { resolveConfigDir } from './paths.js';

const TextScalesSchema = z.object({
  ratingScaleMax: z.number().positive(),
  ratingWords: z.record(z.number().min(0)),
  ratingSymbols: z.object({
    filled: z.array(z.string().min(1)),
    half: z.array(z.string().min(1)),
  }),
  outOfStockPhrases: z.array(z.string().min(1)),
  scarcityPatterns: z.array(z.string().min(1)),
  /** Quantities above this in a scarcity phrase are ordinary stock */
  maxScarcityCount: z.number().int().positive(),
});

export type TextScales = z.infer<typeof TextScalesSchema>;

let cached: TextScales | null = null;

export function loadTextScales(configDir: string = resolveConfigDir()): TextScales {
  const filePath = path.join(configDir, 'text-scales.json');
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed = TextScalesSchema.safeParse(JSON.parse(content));

  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid text scales in ${filePath}: ${message}`);
  }

  for (const pattern of parsed.data.scarcityPatterns) {
    try {
      new RegExp(pattern, 'i');
    } catch (error) {
      throw new Error(`Invalid scarcity pattern "${pattern}" in ${filePath}`, { cause: error });
    }
  }

  return parsed.data;
}

/**
 * Scales from the default config directory, read once per process
 */
export function defaultTextScales(): TextScales {
  if (!cached) {
    cached = loadTextScales();
  }
  return cached;
}
