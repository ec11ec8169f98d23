// ============================================================================
// STEALTH CHROMIUM LAUNCH FLAGS
// ============================================================================
// Flags that hide automation markers without changing how pages render

export const STEALTH_LAUNCH_ARGS = [
  // =========================================================================
  // ANTI-DETECTION
  // =========================================================================
  '--disable-blink-features=AutomationControlled',
  '--disable-features=IsolateOrigins,site-per-process',
  '--disable-infobars',

  // =========================================================================
  // CONTAINER / HEADLESS STABILITY
  // =========================================================================
  '--no-sandbox',
  '--disable-dev-shm-usage',

  // =========================================================================
  // WINDOW CONFIGURATION
  // =========================================================================
  '--no-first-run',
  '--no-default-browser-check',
  '--password-store=basic',
  '--use-mock-keychain',
  '--mute-audio',
];

// Flags to ignore from Playwright's defaults
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'];
