import type { Logger } from 'pino';
import type { DomQuery } from '../browser/domQuery';
import { selectors, waits } from '../site/contract';

/**
 * Clicks through the "Remember this device" interstitial the site may show after 2FA.
 * Returns whether the page was there and got dismissed.
 */
export const dismissRememberDevicePage = async (dom: DomQuery, logger: Logger): Promise<boolean> => {
  try {
    const button = await dom.tryFind(selectors.rememberDeviceButton, {
      timeoutMs: waits.rememberDevicePage,
      state: 'clickable'
    });
    if (!button) {
      logger.info("No 'Remember this device' page found, continuing");
      return false;
    }
    logger.info("Found 'Remember this device' button, clicking it");
    await button.click();
    await dom.pause(waits.afterRememberDevice);
    return true;
  } catch (error) {
    logger.error({ err: error }, 'Error handling remember device page');
    return false;
  }
};

export const tickRememberCheckbox = async (dom: DomQuery, logger: Logger, page: string): Promise<boolean> => {
  const checkbox = await dom.tryFind(selectors.rememberCheckbox, { timeoutMs: waits.rememberCheckbox });
  if (!checkbox) {
    logger.info({ page }, "No 'Remember this device' checkbox found");
    return false;
  }
  if (!(await checkbox.isChecked())) {
    await checkbox.click();
    logger.info({ page }, "Selected 'Remember this device' checkbox");
  }
  return true;
};
