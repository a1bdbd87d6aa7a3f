import type { Logger } from 'pino';
import type { DomQuery } from '../browser/domQuery';
import { FAST_POLL_MS, clockActionSelector, waits, type PunchAction } from '../site/contract';
import type { PunchState } from './punchState';
import { dismissRememberDevicePage } from './rememberDevice';

export type ClockActionOutcome =
  | { kind: 'done'; action: PunchAction }
  | { kind: 'already'; action: PunchAction }
  | { kind: 'failed'; action: PunchAction; reason: string };

export interface ClockActionDeps {
  punchState: PunchState;
  logger: Logger;
}

/**
 * Clicks the requested clock action on an already opened dashboard and waits for the button to go
 * away. When the button never becomes clickable, an action matching the known status counts as
 * already done.
 */
export const performClockAction = async (
  dom: DomQuery,
  action: PunchAction,
  deps: ClockActionDeps
): Promise<ClockActionOutcome> => {
  const { punchState, logger } = deps;
  const selector = clockActionSelector(action);

  await dismissRememberDevicePage(dom, logger);

  const timedOut = (step: string): ClockActionOutcome => {
    if (punchState.snapshot().status === action) {
      logger.info({ action, step }, 'Clock action not available, already in requested state');
      return { kind: 'already', action };
    }
    logger.error({ action, step }, 'Clock action timed out');
    return { kind: 'failed', action, reason: `Could not find clock ${action} button` };
  };

  const button = await dom.tryFind(selector, {
    timeoutMs: waits.clockActionClickable,
    pollMs: FAST_POLL_MS,
    state: 'clickable'
  });
  if (!button) {
    return timedOut('clickable');
  }

  await button.click();

  const confirmed = await dom.waitUntilGone(selector, {
    timeoutMs: waits.clockActionConfirmation,
    pollMs: FAST_POLL_MS
  });
  if (!confirmed) {
    return timedOut('confirmation');
  }

  await punchState.recordAction(action);
  logger.info({ action }, 'Clock action confirmed');
  return { kind: 'done', action };
};
