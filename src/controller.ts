import type { Logger } from 'pino';
import type { DomQuery } from './browser/domQuery';
import { isConfigured, type Credentials, type CredentialsStore } from './config';
import { NavigationError, describeError } from './errors';
import { deriveMenuState, type MenuItemId, type MenuState } from './menu/menuState';
import type { StopTimer } from './scheduler';
import type { BrowserSessionManager, SessionResult } from './services/browserSession';
import { performClockAction, type ClockActionOutcome } from './services/clockAction';
import type { PunchState, PunchStatus } from './services/punchState';
import { detectStatus } from './services/statusDetector';
import { waits, type PunchAction } from './site/contract';
import type { UserInterface } from './ui/userInterface';

export type ClockRequestOutcome = ClockActionOutcome | { kind: 'not_configured'; action: PunchAction };

export type StatusCheckResult =
  | { ok: true; status: PunchStatus }
  | { ok: false; reason: 'not_configured' | 'session_unavailable' | 'error'; message: string };

export type SetupResult =
  | { kind: 'complete'; status: PunchStatus }
  | { kind: 'cancelled' }
  | { kind: 'invalid'; message: string }
  | { kind: 'failed'; message: string };

export interface MenuBarControllerDeps {
  session: BrowserSessionManager;
  punchState: PunchState;
  credentialsStore: CredentialsStore;
  ui: UserInterface;
  logger: Logger;
  dashboardUrl: string;
  detectRetries: number;
  startTimer: (onTick: () => void) => StopTimer;
  now?: () => Date;
  onQuit?: () => void;
}

const SETUP_REQUIRED = 'Please complete setup first';

const menuItemFor = (action: PunchAction): MenuItemId => (action === 'in' ? 'clockIn' : 'clockOut');

/**
 * Wires menu items and the minute timer to the browser automation. Every browser-touching
 * operation runs inside the session lock for its whole duration.
 */
export class MenuBarController {
  private credentials: Credentials | null = null;
  private stopTimer: StopTimer | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly now: () => Date;

  constructor(private readonly deps: MenuBarControllerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get currentCredentials(): Credentials | null {
    return this.credentials;
  }

  get configured(): boolean {
    return isConfigured(this.credentials);
  }

  menuState(): MenuState {
    return deriveMenuState(this.deps.punchState.snapshot(), this.now());
  }

  async start(): Promise<void> {
    const { logger } = this.deps;
    logger.info('Application starting');

    this.credentials = await this.deps.credentialsStore.load();
    this.unsubscribe = this.deps.punchState.subscribe(() => this.refreshMenu());
    await this.deps.punchState.restore();
    this.stopTimer = this.deps.startTimer(() => this.tick());

    if (!this.configured) {
      logger.info('No credentials configured, running setup');
      await this.setup();
    } else {
      await this.initSession();
    }
    this.refreshMenu();
  }

  tick(): void {
    this.refreshMenu();
  }

  refreshMenu(): void {
    this.deps.ui.renderMenu(this.menuState());
  }

  async initSession(): Promise<boolean> {
    const result = await this.deps.session.runExclusive(() => this.establishUnlocked());
    if (!result.ok) {
      this.deps.ui.notify('Error', 'Failed to initialize browser session');
    }
    return result.ok;
  }

  clockIn(): Promise<ClockRequestOutcome> {
    return this.clock('in');
  }

  clockOut(): Promise<ClockRequestOutcome> {
    return this.clock('out');
  }

  async clock(action: PunchAction): Promise<ClockRequestOutcome> {
    const { ui, logger, session } = this.deps;

    if (!this.menuState().items[menuItemFor(action)].enabled) {
      logger.info({ action }, 'Clock action disabled for current status');
      ui.notify('Info', `Already clocked ${action}`);
      return { kind: 'already', action };
    }

    if (!this.configured) {
      ui.alert(SETUP_REQUIRED);
      return { kind: 'not_configured', action };
    }

    ui.notify('Status', `Clocking ${action}...`);

    return session.runExclusive(async (): Promise<ClockRequestOutcome> => {
      try {
        const dom = await this.openDashboardUnlocked();
        if (!dom) {
          ui.notify('Error', 'Failed to initialize browser session');
          return { kind: 'failed', action, reason: 'Failed to initialize browser session' };
        }

        const outcome = await performClockAction(dom, action, {
          punchState: this.deps.punchState,
          logger
        });

        if (outcome.kind === 'done') {
          ui.notify('Success', `Clocked ${action} successfully`);
        } else if (outcome.kind === 'already') {
          ui.notify('Info', `Already clocked ${action}`);
        } else {
          ui.alert(outcome.reason);
          await this.restartUnlocked();
        }
        return outcome;
      } catch (error) {
        if (session.isShutDown) {
          logger.info({ err: error, action }, 'Clock action interrupted by quit');
          return { kind: 'failed', action, reason: describeError(error) };
        }
        logger.error({ err: error, action }, 'Error performing clock action');
        ui.alert(`Error clocking ${action}: ${describeError(error)}`);
        await session.closeUnlocked();
        await this.establishUnlocked();
        return { kind: 'failed', action, reason: describeError(error) };
      }
    });
  }

  async checkStatus(): Promise<StatusCheckResult> {
    const { ui, logger, session, punchState } = this.deps;

    if (!this.configured) {
      ui.alert(SETUP_REQUIRED);
      return { ok: false, reason: 'not_configured', message: SETUP_REQUIRED };
    }

    return session.runExclusive(async (): Promise<StatusCheckResult> => {
      try {
        const dom = await this.openDashboardUnlocked();
        if (!dom) {
          ui.notify('Error', 'Failed to initialize browser session');
          return { ok: false, reason: 'session_unavailable', message: 'Failed to initialize browser session' };
        }
        const status = await detectStatus(dom, this.detectorDeps());
        ui.notify('Status', `Currently clocked ${status}`);
        return { ok: true, status };
      } catch (error) {
        logger.error({ err: error }, 'Error checking status');
        await punchState.recordDetected('unknown');
        await session.closeUnlocked();
        if (!session.isShutDown) {
          await this.establishUnlocked();
        }
        return { ok: false, reason: 'error', message: describeError(error) };
      }
    });
  }

  /** Runs the setup dialog, or applies `provided` credentials without prompting. */
  async setup(provided?: Credentials): Promise<SetupResult> {
    const { ui, logger, session, punchState, credentialsStore } = this.deps;

    const answer = provided ?? (await ui.promptCredentials());
    if (!answer) {
      logger.info('Setup cancelled');
      return { kind: 'cancelled' };
    }

    const email = answer.email.trim();
    const password = answer.password.trim();
    if (!email || !password) {
      ui.alert('Email and password are required');
      return { kind: 'invalid', message: 'Email and password are required' };
    }

    try {
      await credentialsStore.save({ email, password });
    } catch (error) {
      logger.error({ err: error }, 'Error saving configuration');
      ui.alert(`Error saving configuration: ${describeError(error)}`);
      return { kind: 'failed', message: describeError(error) };
    }
    this.credentials = { email, password };

    return session.runExclusive(async (): Promise<SetupResult> => {
      await session.closeUnlocked();
      const result = await this.establishUnlocked();
      if (!result.ok) {
        ui.alert('Could not verify successful login. Please check your credentials.');
        return { kind: 'failed', message: result.reason };
      }
      ui.alert('Setup complete! You can now use the app to clock in and out.');
      return { kind: 'complete', status: punchState.snapshot().status };
    });
  }

  restartSession(): Promise<boolean> {
    return this.deps.session.runExclusive(() => this.restartUnlocked());
  }

  /** Best-effort teardown; does not wait for an automation flow that is mid-wait. */
  async quit(): Promise<void> {
    this.deps.logger.info('Quitting');
    this.teardownTimer();
    await this.deps.session.forceClose();
    this.deps.onQuit?.();
  }

  private teardownTimer() {
    this.stopTimer?.();
    this.stopTimer = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private detectorDeps() {
    return {
      punchState: this.deps.punchState,
      logger: this.deps.logger,
      retries: this.deps.detectRetries
    };
  }

  /** Ensures a session; a freshly logged-in one gets its status read right away. */
  private async establishUnlocked(): Promise<SessionResult> {
    const { session, punchState, logger } = this.deps;
    const result = await session.ensureUnlocked();
    if (!result.ok || !result.created) {
      return result;
    }
    try {
      await detectStatus(result.dom, this.detectorDeps());
      return result;
    } catch (error) {
      logger.error({ err: error }, 'Error reading status after login');
      await session.closeUnlocked();
      await punchState.recordDetected('unknown');
      return { ok: false, reason: describeError(error) };
    }
  }

  private async openDashboardUnlocked(): Promise<DomQuery | null> {
    const { logger, session, dashboardUrl } = this.deps;
    const current = await this.establishUnlocked();
    if (!current.ok) {
      return null;
    }

    try {
      await current.dom.goto(dashboardUrl);
      if (!(await current.dom.waitForLoadState('complete', waits.dashboardLoad))) {
        logger.warn('Dashboard did not finish loading in time');
      }
      return current.dom;
    } catch (error) {
      if (!(error instanceof NavigationError)) {
        throw error;
      }
      logger.error({ err: error }, 'Error navigating to dashboard');
      await session.closeUnlocked();
      const retry = await this.establishUnlocked();
      return retry.ok ? retry.dom : null;
    }
  }

  private async restartUnlocked(): Promise<boolean> {
    if (this.deps.session.isShutDown) {
      return false;
    }
    await this.deps.session.closeUnlocked();
    const result = await this.establishUnlocked();
    this.deps.ui.notify('Session', result.ok ? 'Browser session restarted' : 'Failed to restart browser session');
    return result.ok;
  }
}
