import type { Logger } from 'pino';
import type { BrowserLauncher } from './browser/domQuery';
import { createPlaywrightLauncher } from './browser/playwrightBrowser';
import { createCredentialsStore, createTimerStateStore } from './config';
import { MenuBarController } from './controller';
import type { Env } from './env';
import type { DataPaths } from './paths';
import { startMinuteTimer, type StopTimer } from './scheduler';
import { BrowserSessionManager } from './services/browserSession';
import { PunchState } from './services/punchState';
import { siteUrl, waits } from './site/contract';
import { TerminalInterface } from './ui/terminalInterface';
import type { UserInterface } from './ui/userInterface';

export interface AppContextOptions {
  env: Env;
  paths: DataPaths;
  logger: Logger;
  ui?: UserInterface;
  launcher?: BrowserLauncher;
  startTimer?: (onTick: () => void) => StopTimer;
  now?: () => Date;
  onQuit?: () => void;
}

export interface AppContext {
  logger: Logger;
  punchState: PunchState;
  session: BrowserSessionManager;
  controller: MenuBarController;
  init(): Promise<void>;
  teardown(): Promise<void>;
}

/** Builds every component once; nothing below reaches for module-level state. */
export const createAppContext = (options: AppContextOptions): AppContext => {
  const { env, paths, logger } = options;

  const ui = options.ui ?? new TerminalInterface({ logger });
  const launcher =
    options.launcher ??
    createPlaywrightLauncher(
      {
        profileDir: paths.browserProfileDir,
        headless: env.HEADLESS,
        executablePath: env.CHROME_EXECUTABLE_PATH,
        channel: env.BROWSER_CHANNEL,
        pageLoadTimeoutMs: waits.pageLoad
      },
      logger
    );

  const punchState = new PunchState({
    store: createTimerStateStore(paths.timerFile, logger),
    logger,
    now: options.now
  });

  let controller: MenuBarController | null = null;

  const session = new BrowserSessionManager({
    launcher,
    logger,
    loginUrl: siteUrl(env.SITE_BASE_URL, 'login'),
    getCredentials: () => controller?.currentCredentials ?? null,
    promptTwoFactorCode: () => ui.promptTwoFactorCode()
  });

  controller = new MenuBarController({
    session,
    punchState,
    credentialsStore: createCredentialsStore(paths.credentialsFile, logger),
    ui,
    logger,
    dashboardUrl: siteUrl(env.SITE_BASE_URL, 'dashboard'),
    detectRetries: env.STATUS_DETECT_RETRIES,
    startTimer: options.startTimer ?? ((onTick) => startMinuteTimer(onTick, logger)),
    now: options.now,
    onQuit: options.onQuit
  });

  const app = controller;

  return {
    logger,
    punchState,
    session,
    controller: app,
    init: () => app.start(),
    teardown: () => app.quit()
  };
};
