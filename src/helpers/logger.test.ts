import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileLogSink, Logger, LogLevel, setLogFile } from './logger';

describe('Logger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'payload-bridge-log-'));
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    setLogFile(null);
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one JSON line per entry and routes errors to stderr', () => {
    const log = new Logger('transfer', LogLevel.INFO);

    log.info('Download complete', { bytes: 12 });
    log.error('Download failed');

    expect(process.stdout.write).toHaveBeenCalledTimes(1);
    expect(process.stderr.write).toHaveBeenCalledTimes(1);
    const line = vi.mocked(process.stdout.write).mock.calls[0][0];
    expect(typeof line).toBe('string');
    const entry: unknown = JSON.parse(String(line));
    expect(entry).toMatchObject({
      level: 'INFO',
      context: 'transfer',
      message: 'Download complete',
      meta: { bytes: 12 },
    });
  });

  it('drops entries below the minimum level', () => {
    const log = new Logger('quiet', LogLevel.WARN);
    log.debug('hidden');
    log.info('hidden');
    expect(process.stdout.write).not.toHaveBeenCalled();
  });

  it('names child contexts after their parent', () => {
    new Logger('jobs', LogLevel.INFO).child('download').info('started');
    const line = String(vi.mocked(process.stdout.write).mock.calls[0][0]);
    expect(JSON.parse(line)).toMatchObject({ context: 'jobs:download' });
  });

  it('mirrors every line into the configured log file', async () => {
    const file = path.join(dir, 'bridge.log');
    setLogFile(file);

    const log = new Logger('extract', LogLevel.INFO);
    log.info('first');
    log.error('second');

    const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
    expect(lines.map(l => JSON.parse(l).message)).toEqual(['first', 'second']);
  });
});

describe('FileLogSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('warns once when the file cannot be written and keeps going', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const sink = new FileLogSink(path.join(os.tmpdir(), 'payload-bridge-missing-dir', 'nested', 'x.log'));

    sink.append('one');
    sink.append('two');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain('Log file unavailable');
  });
});
