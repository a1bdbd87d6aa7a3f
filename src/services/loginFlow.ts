import type { Logger } from 'pino';
import type { DomQuery } from '../browser/domQuery';
import type { Credentials } from '../config';
import { FAST_POLL_MS, loggedInMarker, selectors, waits } from '../site/contract';
import { dismissRememberDevicePage, tickRememberCheckbox } from './rememberDevice';

export type LoginPhase = 'NotLoggedIn' | 'EmailEntered' | 'PasswordEntered' | 'TwoFactorPending' | 'LoggedIn';

export type LoginRoute = 'existing_session' | 'password' | 'two_factor';

export type LoginOutcome =
  | { ok: true; phase: 'LoggedIn'; via: LoginRoute }
  | { ok: false; phase: Exclude<LoginPhase, 'LoggedIn'>; reason: string };

/** Asks the user for the verification code. `null` means the dialog was cancelled. */
export type TwoFactorPrompt = () => Promise<string | null>;

export interface LoginFlowDeps {
  logger: Logger;
  promptTwoFactorCode: TwoFactorPrompt;
}

/**
 * Drives the login form from wherever the page currently is. Optional steps (email screen,
 * remember-device checkbox and interstitial, 2FA) are skipped when their element never shows up;
 * a missing password field, submit button or dashboard marker fails the flow.
 */
export const runLoginFlow = async (
  dom: DomQuery,
  credentials: Credentials,
  deps: LoginFlowDeps
): Promise<LoginOutcome> => {
  const { logger } = deps;
  logger.info('Starting login process');

  const marker = await dom.tryFind(loggedInMarker, { timeoutMs: waits.alreadyLoggedInProbe, pollMs: FAST_POLL_MS });
  if (marker) {
    logger.info('Already logged in');
    return { ok: true, phase: 'LoggedIn', via: 'existing_session' };
  }

  if (!(await dom.waitForLoadState('interactive', waits.pageInteractive))) {
    logger.warn('Login page did not become interactive in time');
  }
  logger.info({ url: await dom.currentUrl() }, 'Not logged in, proceeding with login');

  let phase: Exclude<LoginPhase, 'LoggedIn'> = 'NotLoggedIn';

  const emailInput = await dom.tryFind(selectors.emailInput, { timeoutMs: waits.emailInput, pollMs: FAST_POLL_MS });
  if (emailInput) {
    await emailInput.fill(credentials.email);
    phase = 'EmailEntered';
    const continueButton = await dom.tryFind(selectors.submitButton, {
      timeoutMs: waits.emailSubmit,
      pollMs: FAST_POLL_MS,
      state: 'clickable'
    });
    if (continueButton) {
      await continueButton.click();
      logger.info('Submitted email, proceeding to password');
    } else {
      logger.warn('No continue button after email field');
    }
    await dom.pause(waits.afterEmailSubmit);
  } else {
    logger.info('No email field found, assuming returning user flow');
  }

  const passwordInput = await dom.tryFind(selectors.passwordInput, {
    timeoutMs: waits.passwordInput,
    pollMs: FAST_POLL_MS
  });
  if (!passwordInput) {
    logger.error({ phase }, 'Password field not found');
    return { ok: false, phase, reason: 'Password field not found' };
  }
  await passwordInput.fill(credentials.password);
  phase = 'PasswordEntered';
  await tickRememberCheckbox(dom, logger, 'password');

  const submitButton = await dom.tryFind(selectors.submitButton, {
    timeoutMs: waits.passwordSubmit,
    pollMs: FAST_POLL_MS,
    state: 'clickable'
  });
  if (!submitButton) {
    logger.error({ phase }, 'Submit button not found after password');
    return { ok: false, phase, reason: 'Submit button not found' };
  }
  await submitButton.click();
  logger.info('Submitted password');

  let via: LoginRoute = 'password';
  const codeInput = await dom.tryFind(selectors.twoFactorInput, { timeoutMs: waits.twoFactorProbe, pollMs: FAST_POLL_MS });
  if (codeInput) {
    phase = 'TwoFactorPending';
    logger.info('2FA required');
    const answer = await deps.promptTwoFactorCode();
    if (answer === null) {
      logger.error('2FA code entry cancelled');
      return { ok: false, phase, reason: 'Verification code entry cancelled' };
    }
    const code = answer.trim();
    if (!code) {
      logger.error('Empty 2FA code provided');
      return { ok: false, phase, reason: 'Verification code is required' };
    }
    await codeInput.fill(code);
    await tickRememberCheckbox(dom, logger, 'two_factor');

    const codeSubmit = await dom.tryFind(selectors.submitButton, {
      timeoutMs: waits.twoFactorSubmit,
      pollMs: FAST_POLL_MS,
      state: 'clickable'
    });
    if (!codeSubmit) {
      logger.error({ phase }, 'Submit button not found on 2FA page');
      return { ok: false, phase, reason: 'Submit button not found' };
    }
    await codeSubmit.click();
    logger.info('2FA code submitted');
    via = 'two_factor';
  } else {
    logger.info('No 2FA required');
  }

  await dismissRememberDevicePage(dom, logger);

  const dashboard = await dom.tryFind(loggedInMarker, {
    timeoutMs: waits.loggedInConfirmation,
    pollMs: FAST_POLL_MS
  });
  if (!dashboard) {
    logger.error({ phase }, 'Could not verify successful login');
    return { ok: false, phase, reason: 'Could not verify successful login' };
  }

  logger.info({ via }, 'Successfully logged in');
  return { ok: true, phase: 'LoggedIn', via };
};
