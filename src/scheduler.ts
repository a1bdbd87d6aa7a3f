import schedule from 'node-schedule';
import type { Logger } from 'pino';

export type StopTimer = () => void;

/** Fires `onTick` at the top of every minute until stopped. */
export const startMinuteTimer = (onTick: () => void, logger: Logger): StopTimer => {
  const job = schedule.scheduleJob('0 * * * * *', () => {
    try {
      onTick();
    } catch (error) {
      logger.error({ err: error }, 'Minute timer tick failed');
    }
  });
  return () => {
    job.cancel();
  };
};
