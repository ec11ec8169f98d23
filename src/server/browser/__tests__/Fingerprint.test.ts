import { describe, test, expect } from 'vitest';
import {
  buildAcceptLanguage,
  buildHeaders,
  createFingerprint,
  loadUserAgentProfiles,
  COMMON_VIEWPORTS,
  type UserAgentProfile,
} from '../Fingerprint.js';
import { buildStealthScript } from '../stealthScript.js';
import { SeededRandom } from '../../behavior/random.js';

const UK_PROFILE: UserAgentProfile = {
  userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  platform: 'Win32',
  locale: 'en-GB',
  timezoneId: 'Europe/London',
  languages: ['en-GB', 'en'],
};

describe('Fingerprint', () => {
  test('Accept-Language follows the profile languages', () => {
    expect(buildAcceptLanguage(['en-GB', 'en'])).toBe('en-GB,en;q=0.9');
    expect(buildAcceptLanguage(['en-US', 'en', 'fr'])).toBe('en-US,en;q=0.9,fr;q=0.8');
  });

  test('headers match a real browser navigation', () => {
    const headers = buildHeaders(UK_PROFILE);

    expect(headers['Accept-Language']).toBe('en-GB,en;q=0.9');
    expect(headers.DNT).toBe('1');
    expect(headers['Upgrade-Insecure-Requests']).toBe('1');
    expect(headers['Sec-Fetch-Dest']).toBe('document');
    expect(headers['Sec-Fetch-Mode']).toBe('navigate');
    expect(headers['Sec-Fetch-Site']).toBe('none');
    expect(headers['Sec-Fetch-User']).toBe('?1');
  });

  test('locale and timezone come from the same profile as the user agent', () => {
    const fingerprint = createFingerprint([UK_PROFILE], new SeededRandom(1));

    expect(fingerprint).toMatchObject({
      userAgent: UK_PROFILE.userAgent,
      locale: 'en-GB',
      timezoneId: 'Europe/London',
      languages: ['en-GB', 'en'],
    });
    expect(COMMON_VIEWPORTS).toContainEqual(fingerprint.viewport);
  });

  test('the same seed picks the same identity', () => {
    const profiles = loadUserAgentProfiles();

    expect(createFingerprint(profiles, new SeededRandom(21))).toEqual(createFingerprint(profiles, new SeededRandom(21)));
  });

  test('bundled profiles are all Chromium', () => {
    const profiles = loadUserAgentProfiles();

    expect(profiles.length).toBeGreaterThan(0);
    for (const profile of profiles) {
      expect(profile.userAgent).toContain('Chrome/');
    }
  });
});

describe('buildStealthScript', () => {
  test('patches automation markers with the fingerprint values', () => {
    const script = buildStealthScript({ languages: ['en-GB', 'en'], platform: 'Win32' });

    expect(script).toContain(`Object.defineProperty(navigator, 'webdriver', { get: () => undefined });`);
    expect(script).toContain(`Object.defineProperty(navigator, 'languages', { get: () => ["en-GB","en"] });`);
    expect(script).toContain(`Object.defineProperty(navigator, 'platform', { get: () => "Win32" });`);
    expect(script).toContain(`parameters.name === 'notifications'`);
  });

  test('hides navigator.webdriver when evaluated', () => {
    const fakeNavigator = { webdriver: true };
    const script = buildStealthScript({ languages: ['en-US'], platform: 'MacIntel' });
    const run = new Function('navigator', 'window', 'Notification', script);

    run(fakeNavigator, { navigator: fakeNavigator }, { permission: 'default' });

    expect(fakeNavigator.webdriver).toBeUndefined();
    expect(Reflect.get(fakeNavigator, 'languages')).toEqual(['en-US']);
    expect(Reflect.get(fakeNavigator, 'platform')).toBe('MacIntel');
  });
});
