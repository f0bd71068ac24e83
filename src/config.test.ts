import { existsSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, parseConfig } from './config';
import { DEFAULT_USER_AGENT } from './services/transfer';

describe('parseConfig', () => {
  it('falls back to defaults', () => {
    expect(parseConfig({})).toEqual({
      port: 3000,
      storageRoot: '/data/storage',
      dbPath: '/data/payload-bridge.db',
      logFile: null,
      userAgent: DEFAULT_USER_AGENT,
      receiveBufferBytes: 4096,
      sessionInitAttempts: 3,
      requestBodyMaxBytes: 1_048_576,
      shutdownTimeoutMs: 30_000,
    });
  });

  it('reads overrides', () => {
    const config = parseConfig({
      PORT: '8080',
      STORAGE_ROOT: '/mnt/sd',
      LOG_FILE: '/var/log/payload-bridge.log',
      USER_AGENT: 'test-agent',
      SESSION_INIT_ATTEMPTS: '5',
    });
    expect(config.port).toBe(8080);
    expect(config.storageRoot).toBe('/mnt/sd');
    expect(config.logFile).toBe('/var/log/payload-bridge.log');
    expect(config.userAgent).toBe('test-agent');
    expect(config.sessionInitAttempts).toBe(5);
  });

  it('resolves a relative storage root', () => {
    expect(parseConfig({ STORAGE_ROOT: 'storage' }).storageRoot).toBe(path.resolve('storage'));
  });

  it('rejects malformed numbers', () => {
    expect(() => parseConfig({ PORT: 'abc' })).toThrow('Invalid config: PORT must be a positive integer, got "abc"');
    expect(() => parseConfig({ RECEIVE_BUFFER_BYTES: '0' })).toThrow('RECEIVE_BUFFER_BYTES');
    expect(() => parseConfig({ SHUTDOWN_TIMEOUT_MS: '1.5' })).toThrow('SHUTDOWN_TIMEOUT_MS');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'payload-bridge-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the storage and database directories', () => {
    const config = loadConfig({
      STORAGE_ROOT: path.join(dir, 'storage'),
      DB_PATH: path.join(dir, 'db', 'jobs.db'),
    });

    expect(config.storageRoot).toBe(path.join(dir, 'storage'));
    expect(existsSync(path.join(dir, 'storage'))).toBe(true);
    expect(existsSync(path.join(dir, 'db'))).toBe(true);
  });
});
