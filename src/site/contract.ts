/**
 * Everything the automation knows about the payroll site's markup.
 *
 * Selectors use Playwright's selector engine. A change to the site's login form or
 * dashboard should only need an edit here.
 */

export type PunchAction = 'in' | 'out';

export const selectors = {
  emailInput: "input[name='email']",
  passwordInput: "input[type='password']",
  submitButton: "button[type='submit']",
  rememberCheckbox: "input[type='checkbox'][name='remember']",
  twoFactorInput: "input[name='code']",
  rememberDeviceButton: "button:has(span:has-text('Remember this device'))",
  clockIn: "[data-dd-action-name='Clock in']",
  clockOut: "[data-dd-action-name='Clock out']"
} as const;

export const clockActionSelector = (action: PunchAction) =>
  action === 'in' ? selectors.clockIn : selectors.clockOut;

/** Matches either clock action; its presence means the dashboard is logged in. */
export const loggedInMarker = `${selectors.clockIn}, ${selectors.clockOut}`;

export const sitePaths = {
  login: '/login',
  dashboard: '/dashboard'
} as const;

export const siteUrl = (baseUrl: string, page: keyof typeof sitePaths) =>
  new URL(sitePaths[page], `${baseUrl}/`).toString();

export const FAST_POLL_MS = 100;

/** Wait bounds in milliseconds. */
export const waits = {
  alreadyLoggedInProbe: 3_000,
  pageInteractive: 5_000,
  emailInput: 3_000,
  emailSubmit: 3_000,
  afterEmailSubmit: 1_000,
  passwordInput: 5_000,
  rememberCheckbox: 5_000,
  passwordSubmit: 5_000,
  twoFactorProbe: 5_000,
  twoFactorSubmit: 2_000,
  rememberDevicePage: 5_000,
  afterRememberDevice: 1_000,
  loggedInConfirmation: 10_000,
  statusProbe: 5_000,
  dashboardLoad: 10_000,
  clockActionClickable: 10_000,
  clockActionConfirmation: 10_000,
  pageLoad: 30_000
} as const;

export const browserIdentity = {
  userAgent:
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  viewport: { width: 1920, height: 1080 },
  launchArgs: [
    '--disable-blink-features=AutomationControlled',
    '--no-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
    '--disable-extensions',
    '--window-size=1920,1080'
  ],
  ignoredDefaultArgs: ['--enable-automation'],
  hideWebdriverScript: "Object.defineProperty(navigator, 'webdriver', { get: () => undefined })"
} as const;
