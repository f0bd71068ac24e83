import fs from 'fs';
import path from 'path';
import { DEFAULT_USER_AGENT } from './services/transfer';

export interface AppConfig {
  port: number;
  storageRoot: string;
  dbPath: string;
  logFile: string | null;
  userAgent: string;
  receiveBufferBytes: number;
  sessionInitAttempts: number;
  requestBodyMaxBytes: number;
  shutdownTimeoutMs: number;
}

export type Env = Record<string, string | undefined>;

export function requirePositiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid config: ${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/** Parse settings from `env` without touching the filesystem. */
export function parseConfig(env: Env): AppConfig {
  return {
    port: requirePositiveInt(env.PORT, 3000, 'PORT'),
    storageRoot: path.resolve(env.STORAGE_ROOT || '/data/storage'),
    dbPath: env.DB_PATH || '/data/payload-bridge.db',
    logFile: env.LOG_FILE || null,
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
    receiveBufferBytes: requirePositiveInt(env.RECEIVE_BUFFER_BYTES, 4096, 'RECEIVE_BUFFER_BYTES'),
    sessionInitAttempts: requirePositiveInt(env.SESSION_INIT_ATTEMPTS, 3, 'SESSION_INIT_ATTEMPTS'),
    requestBodyMaxBytes: requirePositiveInt(env.REQUEST_BODY_MAX_BYTES, 1_048_576, 'REQUEST_BODY_MAX_BYTES'),
    shutdownTimeoutMs: requirePositiveInt(env.SHUTDOWN_TIMEOUT_MS, 30_000, 'SHUTDOWN_TIMEOUT_MS'),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config = parseConfig(env);

  const dbDir = path.dirname(config.dbPath);
  fs.mkdirSync(dbDir, { recursive: true });
  fs.mkdirSync(config.storageRoot, { recursive: true });

  ensureWritable(dbDir, 'database directory');
  ensureWritable(config.storageRoot, 'storage root');

  return config;
}

function ensureWritable(dir: string, label: string): void {
  try {
    fs.accessSync(dir, fs.constants.W_OK);
  } catch {
    throw new Error(
      `Cannot write to ${label}: ${dir}. ` +
      'If running in Docker with a volume mount, ensure the volume is writable by the container user.',
    );
  }
}
