/**
 * Target registry. Reads configs/targets.json once and validates every
 * entry, so a bad selector block fails at startup rather than mid-scrape.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import type { TargetConfig } from '../../shared/types.js';
import { resolveConfigDir } from './paths.js';
import { PipelineError, ScrapeErrorType } from '../scraper/types/errors.js';

const FieldSelectorSchema = z.union([
  z.string().min(1),
  z.object({ css: z.string().min(1), attribute: z.string().min(1) }),
]);

const TargetSchema = z.object({
  url: z.string().url(),
  type: z.enum(['static', 'dynamic']),
  selectors: z.object({
    product_container: z.string().min(1),
    name: FieldSelectorSchema,
    price: FieldSelectorSchema,
    rating: FieldSelectorSchema,
    availability: FieldSelectorSchema,
  }),
  allowEmpty: z.boolean().optional(),
});

const TargetsFileSchema = z.record(TargetSchema);

export class TargetRegistry {
  private targets: Map<string, TargetConfig> = new Map();

  constructor(private readonly configsDir: string = resolveConfigDir()) {}

  /**
   * Load targets.json. Returns the number of targets loaded.
   */
  load(): number {
    const filePath = path.join(this.configsDir, 'targets.json');
    if (!fs.existsSync(filePath)) {
      throw new PipelineError(`Target config not found: ${filePath}`, ScrapeErrorType.CONFIG);
    }

    let content: unknown;
    try {
      content = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new PipelineError(`Target config ${filePath} is not valid JSON`, ScrapeErrorType.CONFIG, { cause: error });
    }

    const parsed = TargetsFileSchema.safeParse(content);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new PipelineError(`Invalid target config in ${filePath}: ${message}`, ScrapeErrorType.CONFIG);
    }

    this.targets.clear();
    for (const [name, target] of Object.entries(parsed.data)) {
      this.targets.set(name, { name, ...target });
    }

    console.log(`[TargetRegistry] Loaded ${this.targets.size} targets from ${filePath}`);
    return this.targets.size;
  }

  get(name: string): TargetConfig {
    if (this.targets.size === 0) {
      this.load();
    }
    const target = this.targets.get(name);
    if (!target) {
      throw new PipelineError(
        `Unknown target: ${name}. Available: ${this.names().join(', ')}`,
        ScrapeErrorType.CONFIG
      );
    }
    return target;
  }

  names(): string[] {
    return Array.from(this.targets.keys());
  }
}
