import type { Fingerprint } from './Fingerprint.js';

/**
 * Init script injected into every document before page scripts run.
 * Complements the stealth plugin with values that follow the session's
 * fingerprint, so navigator and HTTP headers agree.
 */
export function buildStealthScript(fingerprint: Pick<Fingerprint, 'languages' | 'platform'>): string {
  const languages = JSON.stringify(fingerprint.languages);
  const platform = JSON.stringify(fingerprint.platform);

  return `
(() => {
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });

  Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });

  Object.defineProperty(navigator, 'languages', { get: () => ${languages} });

  Object.defineProperty(navigator, 'platform', { get: () => ${platform} });

  if (!window.chrome) {
    window.chrome = { runtime: {} };
  }

  const originalQuery = window.navigator.permissions && window.navigator.permissions.query;
  if (originalQuery) {
    window.navigator.permissions.query = (parameters) =>
      parameters.name === 'notifications'
        ? Promise.resolve({ state: Notification.permission })
        : originalQuery.call(window.navigator.permissions, parameters);
  }
})();
`;
}
