import type { Logger } from 'pino';
import type { DomQuery } from '../browser/domQuery';
import { selectors, waits } from '../site/contract';
import type { PunchState, PunchStatus } from './punchState';
import { dismissRememberDevicePage } from './rememberDevice';

export interface StatusDetectorDeps {
  punchState: PunchState;
  logger: Logger;
  /** How many times to retry after clicking away the remember-device page. */
  retries: number;
}

/**
 * Reads the punch status off the dashboard: a "Clock in" action means clocked out and vice versa.
 * The result is written through to `punchState`.
 */
export const detectStatus = async (dom: DomQuery, deps: StatusDetectorDeps, attempt = 0): Promise<PunchStatus> => {
  const { punchState, logger } = deps;

  if (await dom.tryFind(selectors.clockIn, { timeoutMs: waits.statusProbe })) {
    await punchState.recordDetected('out');
    return 'out';
  }

  if (await dom.tryFind(selectors.clockOut, { timeoutMs: waits.statusProbe })) {
    await punchState.recordDetected('in');
    return 'in';
  }

  if (attempt < deps.retries && (await dismissRememberDevicePage(dom, logger))) {
    logger.info({ attempt: attempt + 1 }, 'Retrying status detection after remember device page');
    return detectStatus(dom, deps, attempt + 1);
  }

  logger.warn('Neither clock action found on dashboard');
  await punchState.recordDetected('unknown');
  return 'unknown';
};
