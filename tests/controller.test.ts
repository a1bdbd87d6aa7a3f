import { describe, expect, it, vi } from 'vitest';
import { DASHBOARD_URL, LOGIN_URL } from './fakeSite';
import { START, startApp } from './harness';
import { TEST_CREDENTIALS, readJsonFile } from './helpers';

describe('MenuBarController', () => {
  describe('first run', () => {
    it('asks for credentials before any browser is launched', async () => {
      const app = await startApp();

      expect(app.ui.promptCredentials).toHaveBeenCalledTimes(1);
      expect(app.launcher.launches).toBe(0);
      expect(app.controller.configured).toBe(false);
      expect(app.lastRendered()?.title).toBe('⏱');
    });

    it('saves trimmed credentials, logs in and reads the status', async () => {
      const app = await startApp({
        ui: { credentials: { email: ' worker@example.com ', password: ' test-password ' } },
        site: { status: 'out' }
      });

      expect(await readJsonFile(app.paths.credentialsFile)).toEqual({
        email: 'worker@example.com',
        password: 'test-password'
      });
      expect(app.ui.alert).toHaveBeenCalledWith('Setup complete! You can now use the app to clock in and out.');
      expect(app.launcher.launches).toBe(1);
      expect(app.launcher.lastSite?.visits).toEqual([LOGIN_URL]);
      expect(app.controller.menuState().status).toBe('out');
      expect(app.lastRendered()?.title).toBe('⏱☒');
    });

    it('passes the verification code prompt through to the login', async () => {
      const app = await startApp({
        ui: { credentials: TEST_CREDENTIALS, twoFactorCode: '123456' },
        site: { twoFactor: true, status: 'in' }
      });

      expect(app.ui.promptTwoFactorCode).toHaveBeenCalledTimes(1);
      expect(app.controller.menuState().status).toBe('in');
    });

    it('reports credentials the site rejects', async () => {
      const app = await startApp({ ui: { credentials: TEST_CREDENTIALS }, site: { status: 'none' } });

      expect(app.ui.alert).toHaveBeenCalledWith('Could not verify successful login. Please check your credentials.');
      expect(app.session.isActive).toBe(false);
    });

    it('rejects blank credentials without saving them', async () => {
      const app = await startApp();

      const result = await app.controller.setup({ email: '  ', password: 'test-password' });

      expect(result).toEqual({ kind: 'invalid', message: 'Email and password are required' });
      expect(app.ui.alert).toHaveBeenCalledWith('Email and password are required');
      await expect(readJsonFile(app.paths.credentialsFile)).rejects.toThrow();
    });
  });

  describe('with saved credentials', () => {
    it('logs in on start without prompting', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'in' } });

      expect(app.ui.promptCredentials).not.toHaveBeenCalled();
      expect(app.session.isActive).toBe(true);
      expect(app.controller.menuState().status).toBe('in');
      expect(app.controller.menuState().timeClockedLabel).toBe('Time Clocked: 00:00');
    });

    it('clocks in through the dashboard and starts the timer', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'out' } });

      const outcome = await app.controller.clockIn();

      expect(outcome).toEqual({ kind: 'done', action: 'in' });
      expect(app.ui.notify).toHaveBeenCalledWith('Status', 'Clocking in...');
      expect(app.ui.notify).toHaveBeenCalledWith('Success', 'Clocked in successfully');
      expect(app.launcher.lastSite?.visits).toEqual([LOGIN_URL, DASHBOARD_URL]);
      expect(await readJsonFile(app.paths.timerFile)).toEqual({ clock_in_time: START.getTime() / 1000 });
      expect(app.controller.menuState().items).toEqual({
        clockIn: { label: 'Clock In', enabled: false },
        clockOut: { label: 'Clock Out', enabled: true }
      });
    });

    it('answers a disabled menu item without touching the browser', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'out' } });

      const outcome = await app.controller.clockOut();

      expect(outcome).toEqual({ kind: 'already', action: 'out' });
      expect(app.ui.notify).toHaveBeenCalledWith('Info', 'Already clocked out');
      expect(app.launcher.lastSite?.visits).toEqual([LOGIN_URL]);
    });

    it('alerts and restarts the session when the action cannot be performed', async () => {
      const app = await startApp({
        savedCredentials: TEST_CREDENTIALS,
        site: { status: 'out', clockButtonsDisabled: true }
      });

      const outcome = await app.controller.clockIn();

      expect(outcome).toEqual({ kind: 'failed', action: 'in', reason: 'Could not find clock in button' });
      expect(app.ui.alert).toHaveBeenCalledWith('Could not find clock in button');
      expect(app.ui.notify).toHaveBeenCalledWith('Session', 'Browser session restarted');
      expect(app.launcher.launches).toBe(2);
      expect(app.launcher.closed).toBe(1);
    });

    it('opens a new session when the dashboard cannot be loaded', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'out' } });
      const first = app.launcher.lastSite;
      if (first) {
        first.failNavigation = true;
      }

      const outcome = await app.controller.clockIn();

      expect(outcome).toEqual({ kind: 'done', action: 'in' });
      expect(app.launcher.launches).toBe(2);
      expect(app.launcher.lastSite?.status).toBe('in');
    });

    it('re-reads the status on request', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'out' } });
      const site = app.launcher.lastSite;
      if (site) {
        site.status = 'in';
      }

      const result = await app.controller.checkStatus();

      expect(result).toEqual({ ok: true, status: 'in' });
      expect(app.ui.notify).toHaveBeenCalledWith('Status', 'Currently clocked in');
      expect(app.controller.menuState().title).toBe('⏱☑');
    });

    it('restarts the browser session on request', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS });

      expect(await app.controller.restartSession()).toBe(true);

      expect(app.launcher.launches).toBe(2);
      expect(app.ui.notify).toHaveBeenCalledWith('Session', 'Browser session restarted');
    });

    it('refreshes the elapsed time on each timer tick', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'out' } });
      await app.controller.clockIn();

      app.advance(65);
      app.tick();

      expect(app.lastRendered()?.timeClockedLabel).toBe('Time Clocked: 01:05');
    });

    it('gives up the session when the status read fails right after login', async () => {
      const app = await startApp({
        savedCredentials: TEST_CREDENTIALS,
        site: { status: 'out', statusReadError: 'Target page, context or browser has been closed' }
      });

      expect(app.ui.notify).toHaveBeenCalledWith('Error', 'Failed to initialize browser session');
      expect(app.session.isActive).toBe(false);
      expect(app.launcher.closed).toBe(1);
      expect(app.controller.menuState().status).toBe('unknown');
      expect(await readJsonFile(app.paths.timerFile)).toEqual({ clock_in_time: null });

      expect(await app.controller.restartSession()).toBe(false);
      expect(app.ui.notify).toHaveBeenCalledWith('Session', 'Failed to restart browser session');
      expect(app.launcher.closed).toBe(2);
    });

    it('does not start a new browser when quit interrupts a clock action', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS, site: { status: 'out' } });
      const site = app.launcher.lastSite;
      if (!site) {
        throw new Error('expected a launched site');
      }
      const tryFind = site.tryFind.bind(site);
      let releaseGate: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        releaseGate = resolve;
      });
      const spy = vi.spyOn(site, 'tryFind').mockImplementationOnce(async (selector, options) => {
        await gate;
        return tryFind(selector, options);
      });

      const pending = app.controller.clockIn();
      await vi.waitFor(() => expect(spy).toHaveBeenCalled());
      await app.teardown();
      releaseGate();
      const outcome = await pending;

      expect(outcome.kind).toBe('failed');
      expect(app.launcher.launches).toBe(1);
      expect(app.session.isActive).toBe(false);
      expect(app.ui.alert).not.toHaveBeenCalled();
    });

    it('stops the timer and closes the browser on quit', async () => {
      const app = await startApp({ savedCredentials: TEST_CREDENTIALS });

      await app.teardown();

      expect(app.stopTimer).toHaveBeenCalledTimes(1);
      expect(app.onQuit).toHaveBeenCalledTimes(1);
      expect(app.session.isActive).toBe(false);
      expect(app.launcher.closed).toBe(1);
    });
  });

  describe('before setup', () => {
    it('refuses clock actions', async () => {
      const app = await startApp();

      const outcome = await app.controller.clockIn();

      expect(outcome).toEqual({ kind: 'not_configured', action: 'in' });
      expect(app.ui.alert).toHaveBeenCalledWith('Please complete setup first');
      expect(app.launcher.launches).toBe(0);
    });

    it('refuses status checks', async () => {
      const app = await startApp();

      const result = await app.controller.checkStatus();

      expect(result).toEqual({ ok: false, reason: 'not_configured', message: 'Please complete setup first' });
    });
  });
});
