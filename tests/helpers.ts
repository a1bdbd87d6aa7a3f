import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { vi } from 'vitest';
import type { Credentials } from '../src/config';
import { resolveDataPaths } from '../src/paths';
import type { UserInterface } from '../src/ui/userInterface';

export const silentLogger = () => pino({ level: 'silent' });

export const TEST_CREDENTIALS: Credentials = { email: 'worker@example.com', password: 'test-password' };

export const makeTempHome = () => mkdtemp(join(tmpdir(), 'payroll-punch-'));

export const makeTempPaths = async () => resolveDataPaths(await makeTempHome());

export const readJsonFile = async (filePath: string): Promise<unknown> => JSON.parse(await readFile(filePath, 'utf-8'));

export interface UiStubOptions {
  credentials?: Credentials | null;
  twoFactorCode?: string | null;
}

export const createUiStub = (options: UiStubOptions = {}) => ({
  promptCredentials: vi.fn<UserInterface['promptCredentials']>().mockResolvedValue(options.credentials ?? null),
  promptTwoFactorCode: vi.fn<UserInterface['promptTwoFactorCode']>().mockResolvedValue(options.twoFactorCode ?? null),
  alert: vi.fn<UserInterface['alert']>(),
  notify: vi.fn<UserInterface['notify']>(),
  renderMenu: vi.fn<UserInterface['renderMenu']>()
});
