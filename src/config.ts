import fs from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';

export interface Credentials {
  email: string;
  password: string;
}

export interface TimerState {
  /** Epoch seconds of the clock-in, or null while not clocked in. */
  clockInTime: number | null;
}

const credentialsFileSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1)
});

const timerFileSchema = z.object({
  clock_in_time: z.coerce.number().positive().nullable().optional()
});

export const isConfigured = (credentials: Credentials | null): credentials is Credentials =>
  Boolean(credentials && credentials.email && credentials.password);

const readJson = async (filePath: string): Promise<unknown | undefined> => {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(raw);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
};

const writeJson = async (filePath: string, value: unknown): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
};

export interface CredentialsStore {
  load(): Promise<Credentials | null>;
  save(credentials: Credentials): Promise<void>;
}

export const createCredentialsStore = (filePath: string, logger: Logger): CredentialsStore => ({
  async load() {
    let data: unknown;
    try {
      data = await readJson(filePath);
    } catch (error) {
      logger.error({ err: error, filePath }, 'Error loading configuration');
      return null;
    }
    if (data === undefined) {
      return null;
    }
    const parsed = credentialsFileSchema.safeParse(data);
    if (!parsed.success) {
      logger.error({ filePath, issues: parsed.error.issues }, 'Configuration file is missing email or password');
      return null;
    }
    return { email: parsed.data.email, password: parsed.data.password };
  },

  async save(credentials) {
    await writeJson(filePath, { email: credentials.email, password: credentials.password });
    logger.info({ filePath }, 'Configuration saved');
  }
});

export interface TimerStateStore {
  load(): Promise<TimerState>;
  save(state: TimerState): Promise<void>;
}

export const createTimerStateStore = (filePath: string, logger: Logger): TimerStateStore => ({
  async load() {
    try {
      const data = await readJson(filePath);
      if (data === undefined) {
        return { clockInTime: null };
      }
      const parsed = timerFileSchema.safeParse(data);
      if (!parsed.success) {
        logger.error({ filePath, issues: parsed.error.issues }, 'Error loading timer state');
        return { clockInTime: null };
      }
      return { clockInTime: parsed.data.clock_in_time ?? null };
    } catch (error) {
      logger.error({ err: error, filePath }, 'Error loading timer state');
      return { clockInTime: null };
    }
  },

  async save(state) {
    try {
      await writeJson(filePath, { clock_in_time: state.clockInTime });
    } catch (error) {
      logger.error({ err: error, filePath }, 'Error saving timer state');
    }
  }
});
