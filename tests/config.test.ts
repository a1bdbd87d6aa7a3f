import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { createCredentialsStore, createTimerStateStore, isConfigured } from '../src/config';
import { makeTempHome, makeTempPaths, readJsonFile, silentLogger } from './helpers';

describe('credentials store', () => {
  it('returns null when no configuration file exists', async () => {
    const paths = await makeTempPaths();
    const store = createCredentialsStore(paths.credentialsFile, silentLogger());

    expect(await store.load()).toBeNull();
  });

  it('writes email and password as pretty JSON and reads them back', async () => {
    const paths = await makeTempPaths();
    const store = createCredentialsStore(paths.credentialsFile, silentLogger());

    await store.save({ email: 'worker@example.com', password: 'test-password' });

    expect(await readJsonFile(paths.credentialsFile)).toEqual({
      email: 'worker@example.com',
      password: 'test-password'
    });
    expect(await store.load()).toEqual({ email: 'worker@example.com', password: 'test-password' });
  });

  it('creates missing parent directories on save', async () => {
    const home = await makeTempHome();
    const filePath = join(home, 'nested', 'config.json');
    const store = createCredentialsStore(filePath, silentLogger());

    await store.save({ email: 'worker@example.com', password: 'test-password' });

    expect(await readJsonFile(filePath)).toEqual({ email: 'worker@example.com', password: 'test-password' });
  });

  it('treats a corrupt file as unconfigured', async () => {
    const paths = await makeTempPaths();
    await writeFile(paths.credentialsFile, '{"email": "worker@', 'utf-8');
    const store = createCredentialsStore(paths.credentialsFile, silentLogger());

    expect(await store.load()).toBeNull();
  });

  it('treats a file without a password as unconfigured', async () => {
    const paths = await makeTempPaths();
    await writeFile(paths.credentialsFile, JSON.stringify({ email: 'worker@example.com', password: '' }), 'utf-8');
    const store = createCredentialsStore(paths.credentialsFile, silentLogger());

    expect(await store.load()).toBeNull();
  });

  it('recognises configured credentials', () => {
    expect(isConfigured(null)).toBe(false);
    expect(isConfigured({ email: '', password: 'test-password' })).toBe(false);
    expect(isConfigured({ email: 'worker@example.com', password: 'test-password' })).toBe(true);
  });
});

describe('timer state store', () => {
  it('defaults to no clock-in time when the file is missing', async () => {
    const paths = await makeTempPaths();
    const store = createTimerStateStore(paths.timerFile, silentLogger());

    expect(await store.load()).toEqual({ clockInTime: null });
  });

  it('round-trips a fractional epoch timestamp', async () => {
    const paths = await makeTempPaths();
    const store = createTimerStateStore(paths.timerFile, silentLogger());

    await store.save({ clockInTime: 1709542800.25 });

    expect(await readJsonFile(paths.timerFile)).toEqual({ clock_in_time: 1709542800.25 });
    expect(await store.load()).toEqual({ clockInTime: 1709542800.25 });
  });

  it('stores null explicitly after clocking out', async () => {
    const paths = await makeTempPaths();
    const store = createTimerStateStore(paths.timerFile, silentLogger());

    await store.save({ clockInTime: null });

    expect(await readJsonFile(paths.timerFile)).toEqual({ clock_in_time: null });
    expect(await store.load()).toEqual({ clockInTime: null });
  });

  it('ignores unreadable or invalid timer files', async () => {
    const paths = await makeTempPaths();
    const store = createTimerStateStore(paths.timerFile, silentLogger());

    await writeFile(paths.timerFile, 'not json', 'utf-8');
    expect(await store.load()).toEqual({ clockInTime: null });

    await writeFile(paths.timerFile, JSON.stringify({ clock_in_time: 'yesterday' }), 'utf-8');
    expect(await store.load()).toEqual({ clockInTime: null });
  });

  it('logs instead of throwing when the timer file cannot be written', async () => {
    const home = await makeTempHome();
    const filePath = join(home, 'timer.json');
    await mkdir(filePath);
    const store = createTimerStateStore(filePath, silentLogger());

    await expect(store.save({ clockInTime: 1709542800 })).resolves.toBeUndefined();
  });
});
