import type { Logger } from 'pino';
import type { BrowserHandle, BrowserLauncher, DomQuery } from '../browser/domQuery';
import { isConfigured, type Credentials } from '../config';
import { describeError } from '../errors';
import { runLoginFlow, type LoginPhase, type TwoFactorPrompt } from './loginFlow';
import { SessionLock } from './sessionLock';

export type SessionResult =
  | { ok: true; created: boolean; dom: DomQuery }
  | { ok: false; reason: string; phase?: LoginPhase };

const SHUTTING_DOWN = 'Application is shutting down';

export interface BrowserSessionDeps {
  launcher: BrowserLauncher;
  logger: Logger;
  loginUrl: string;
  getCredentials: () => Credentials | null;
  promptTwoFactorCode: TwoFactorPrompt;
  lock?: SessionLock;
}

/**
 * Owns the single browser handle. Methods suffixed `Unlocked` expect the caller to already be
 * inside `runExclusive`; the plain variants take the lock themselves.
 */
export class BrowserSessionManager {
  private handle: BrowserHandle | null = null;
  private active = false;
  private shutDown = false;
  private readonly lock: SessionLock;

  constructor(private readonly deps: BrowserSessionDeps) {
    this.lock = deps.lock ?? new SessionLock();
  }

  get isActive() {
    return this.active && this.handle !== null;
  }

  get isShutDown() {
    return this.shutDown;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.lock.run(task);
  }

  ensureSession(): Promise<SessionResult> {
    return this.runExclusive(() => this.ensureUnlocked());
  }

  closeSession(): Promise<void> {
    return this.runExclusive(() => this.closeUnlocked());
  }

  /**
   * Closes without waiting for the lock; a flow holding it will fail on its next browser call.
   * No browser is launched afterwards.
   */
  forceClose(): Promise<void> {
    this.shutDown = true;
    return this.closeUnlocked();
  }

  async ensureUnlocked(): Promise<SessionResult> {
    const { logger } = this.deps;

    if (this.shutDown) {
      logger.info('Not starting a browser session while shutting down');
      return { ok: false, reason: SHUTTING_DOWN };
    }

    if (this.handle) {
      try {
        const url = await this.handle.dom.currentUrl();
        this.active = true;
        logger.info({ url }, 'Existing browser session is still active');
        return { ok: true, created: false, dom: this.handle.dom };
      } catch (error) {
        logger.warn({ err: error }, 'Existing browser session is stale, creating new one');
        await this.closeUnlocked();
      }
    }

    const credentials = this.deps.getCredentials();
    if (!isConfigured(credentials)) {
      logger.warn('Cannot start a browser session without credentials');
      return { ok: false, reason: 'Credentials are not configured' };
    }

    try {
      logger.info('Initializing new browser session');
      const handle = await this.deps.launcher.launch();
      this.handle = handle;
      if (this.shutDown) {
        await this.closeUnlocked();
        return { ok: false, reason: SHUTTING_DOWN };
      }

      await handle.dom.goto(this.deps.loginUrl);
      const outcome = await runLoginFlow(handle.dom, credentials, {
        logger,
        promptTwoFactorCode: this.deps.promptTwoFactorCode
      });

      if (!outcome.ok) {
        logger.error({ phase: outcome.phase, reason: outcome.reason }, 'Login failed during session initialization');
        await this.closeUnlocked();
        return { ok: false, reason: outcome.reason, phase: outcome.phase };
      }

      this.active = true;
      logger.info({ via: outcome.via }, 'Login successful, browser session initialized');
      return { ok: true, created: true, dom: handle.dom };
    } catch (error) {
      logger.error({ err: error }, 'Error initializing browser session');
      await this.closeUnlocked();
      return { ok: false, reason: describeError(error) };
    }
  }

  async closeUnlocked(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.active = false;
    if (!handle) {
      return;
    }
    try {
      await handle.close();
    } catch (error) {
      this.deps.logger.warn({ err: error }, 'Error while closing browser');
    }
    this.deps.logger.info('Browser session closed');
  }
}
