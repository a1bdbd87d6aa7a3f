import os from 'os';
import { config } from 'dotenv';
import { z } from 'zod';

config();

const booleanFromEnv = z.preprocess((value) => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value === 1;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (!normalized) {
      return undefined;
    }
    if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) {
      return false;
    }
  }
  return value;
}, z.boolean());

const baseUrlSchema = z
  .string()
  .trim()
  .refine((value) => {
    try {
      const parsed = new URL(value);
      return ['http:', 'https:'].includes(parsed.protocol);
    } catch {
      return false;
    }
  }, 'Invalid url')
  .transform((value) => value.replace(/\/+$/, ''));

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  PUNCH_HOME: z.string().trim().min(1).default(os.homedir()),
  SITE_BASE_URL: baseUrlSchema.default('https://app.gusto.com'),
  CHROME_EXECUTABLE_PATH: optionalString,
  BROWSER_CHANNEL: z.string().trim().min(1).default('chrome'),
  HEADLESS: booleanFromEnv.default(true),
  CONTROL_HOST: z.string().trim().min(1).default('127.0.0.1'),
  CONTROL_PORT: z.coerce.number().int().min(1).max(65535).default(4790),
  STATUS_DETECT_RETRIES: z.coerce.number().int().min(0).max(5).default(1)
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv) => envSchema.safeParse(source);

const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
