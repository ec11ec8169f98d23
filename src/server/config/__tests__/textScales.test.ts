import { describe, test, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { loadTextScales } from '../textScales.js';

const CONFIGS_DIR = path.join(process.cwd(), 'configs');

describe('loadTextScales', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  test('reads the bundled scales', () => {
    const scales = loadTextScales(CONFIGS_DIR);

    expect(scales.ratingScaleMax).toBe(5);
    expect(scales.ratingWords.three).toBe(3);
    expect(scales.outOfStockPhrases).toContain('sold out');
  });

  test('rejects a scarcity pattern that is not a valid expression', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scales-'));
    const scales = loadTextScales(CONFIGS_DIR);
    fs.writeFileSync(
      path.join(tmpDir, 'text-scales.json'),
      JSON.stringify({ ...scales, scarcityPatterns: ['only (\\d+ left'] })
    );

    expect(() => loadTextScales(tmpDir ?? '')).toThrow('Invalid scarcity pattern "only (\\d+ left"');
  });

  test('rejects a file missing a section', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scales-'));
    fs.writeFileSync(path.join(tmpDir, 'text-scales.json'), JSON.stringify({ ratingScaleMax: 5 }));

    expect(() => loadTextScales(tmpDir ?? '')).toThrow('Invalid text scales');
  });
});
