// ============================================================================
// BROWSER FINGERPRINT
// ============================================================================
// One coherent identity per session: user agent, platform, locale, timezone,
// languages, viewport and the request headers a real Chrome would send.

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import type { Viewport } from './PageHandle.js';
import { pick, systemRandom, type RandomSource } from '../behavior/random.js';
import { resolveConfigDir } from '../config/paths.js';

const UserAgentProfileSchema = z.object({
  userAgent: z.string().min(1),
  platform: z.string().min(1),
  locale: z.string().min(2),
  timezoneId: z.string().min(1),
  languages: z.array(z.string().min(2)).min(1),
});

export type UserAgentProfile = z.infer<typeof UserAgentProfileSchema>;

export interface Fingerprint extends UserAgentProfile {
  viewport: Viewport;
  headers: Record<string, string>;
}

export const COMMON_VIEWPORTS: readonly Viewport[] = [
  { width: 1920, height: 1080 },
  { width: 1536, height: 864 },
  { width: 1440, height: 900 },
  { width: 1366, height: 768 },
];

export function loadUserAgentProfiles(configDir: string = resolveConfigDir()): UserAgentProfile[] {
  const filePath = path.join(configDir, 'user-agents.json');
  const parsed = z.array(UserAgentProfileSchema).min(1).safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));

  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid user agent profiles in ${filePath}: ${message}`);
  }

  return parsed.data;
}

/**
 * Accept-Language with descending q-values: ["en-GB", "en"] → "en-GB,en;q=0.9"
 */
export function buildAcceptLanguage(languages: readonly string[]): string {
  return languages
    .map((lang, i) => (i === 0 ? lang : `${lang};q=${Math.max(0.1, 1 - i * 0.1).toFixed(1)}`))
    .join(',');
}

export function buildHeaders(profile: UserAgentProfile): Record<string, string> {
  return {
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': buildAcceptLanguage(profile.languages),
    'Accept-Encoding': 'gzip, deflate, br',
    DNT: '1',
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Cache-Control': 'max-age=0',
  };
}

export function createFingerprint(
  profiles: readonly UserAgentProfile[],
  random: RandomSource = systemRandom,
  viewports: readonly Viewport[] = COMMON_VIEWPORTS
): Fingerprint {
  const profile = pick(random, profiles);
  return {
    ...profile,
    viewport: pick(random, viewports),
    headers: buildHeaders(profile),
  };
}
