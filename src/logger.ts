import pino from 'pino';
import { env } from './env';
import { dataPaths } from './paths';

const level = env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');

const buildLogger = () => {
  if (level === 'silent') {
    return pino({ level });
  }
  const streams: pino.StreamEntry[] = [
    {
      level,
      stream: pino.destination({ dest: dataPaths.logFile, append: true, mkdir: true, sync: true })
    }
  ];
  if (env.NODE_ENV !== 'test') {
    streams.push({ level, stream: process.stdout });
  }
  return pino({ level, timestamp: pino.stdTimeFunctions.isoTime }, pino.multistream(streams));
};

export const logger = buildLogger();
