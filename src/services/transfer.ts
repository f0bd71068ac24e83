import { mkdir, open, rm, stat, type FileHandle } from 'fs/promises';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import type { ReadableStream as NodeReadableStream } from 'stream/web';
import { errorMessage, Logger } from '../helpers/logger';
import { fileNameFromUrl, hasTemplateMarkers, isDirectoryMarker, parentDirectory } from '../helpers/paths';
import { retry } from '../helpers/retry';
import { completed, failed } from '../types/operations';
import type { OperationResult, TransferRequest } from '../types/operations';
import { OperationContext } from './progress';

const log = new Logger('transfer');

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';
export const DEFAULT_RECEIVE_BUFFER_BYTES = 4096;
export const DEFAULT_SESSION_INIT_ATTEMPTS = 3;

/**
 * One transport session per download. Aborting it tears down the request;
 * releasing it frees whatever the request still holds.
 */
export interface TransportSession {
  readonly signal: AbortSignal;
  abort(): void;
  release(): void;
}

export type SessionFactory = () => TransportSession | Promise<TransportSession>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TransferOptions {
  userAgent?: string;
  receiveBufferBytes?: number;
  sessionInitAttempts?: number;
  fetchImpl?: FetchLike;
  openSession?: SessionFactory;
  /** Used when a call does not bring its own context. */
  context?: OperationContext;
}

export function createFetchSession(): TransportSession {
  const controller = new AbortController();
  return {
    signal: controller.signal,
    abort: () => controller.abort(),
    release: () => {
      if (!controller.signal.aborted) controller.abort();
    },
  };
}

/**
 * Downloads a single URL to disk.
 *
 * A call runs Initializing → Transferring → Completed, or ends as cancelled
 * or failed. Every path except Completed leaves no destination file behind.
 */
export class TransferCoordinator {
  readonly context: OperationContext;
  private readonly userAgent: string;
  private readonly receiveBufferBytes: number;
  private readonly sessionInitAttempts: number;
  private readonly fetchImpl: FetchLike;
  private readonly openSession: SessionFactory;

  constructor(options: TransferOptions = {}) {
    this.context = options.context ?? new OperationContext('download');
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.receiveBufferBytes = options.receiveBufferBytes ?? DEFAULT_RECEIVE_BUFFER_BYTES;
    this.sessionInitAttempts = options.sessionInitAttempts ?? DEFAULT_SESSION_INIT_ATTEMPTS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.openSession = options.openSession ?? createFetchSession;
  }

  async download(url: string, destination: string, context?: OperationContext): Promise<boolean> {
    const result = await this.transfer({ url, destination }, context);
    return result.ok;
  }

  async transfer(request: TransferRequest, context: OperationContext = this.context): Promise<OperationResult> {
    context.resetAbort();
    context.monitor.reset();
    const { url } = request;

    if (hasTemplateMarkers(url)) {
      return report(failed('InvalidInput', `Invalid URL: ${url}`), { url });
    }

    let destination = request.destination;
    try {
      if (isDirectoryMarker(destination)) {
        const fileName = fileNameFromUrl(url);
        if (!fileName) {
          return report(failed('InvalidInput', `Invalid URL: ${url}`), { url });
        }
        await mkdir(destination, { recursive: true });
        destination += fileName;
      } else {
        await mkdir(parentDirectory(destination), { recursive: true });
      }
    } catch (err) {
      return report(failed('IOFailure', `Cannot create directory for ${destination}: ${errorMessage(err)}`), { url });
    }

    let session: TransportSession;
    try {
      session = await retry(this.openSession, {
        attempts: this.sessionInitAttempts,
        onFailure: (err, attempt) => {
          log.warn('Error initializing transport session, retrying', { attempt, error: errorMessage(err) });
        },
      });
    } catch {
      return report(
        failed('InitializationFailure', `Error initializing transport session after ${this.sessionInitAttempts} attempts`),
        { url },
      );
    }

    let file: FileHandle;
    try {
      file = await open(destination, 'w');
    } catch (err) {
      session.release();
      return report(failed('IOFailure', `Error opening file: ${destination} (${errorMessage(err)})`), { url });
    }

    let result: OperationResult;
    try {
      result = await this.execute(url, file, session, context);
    } finally {
      session.release();
      await closeFile(file, destination);
    }

    if (!result.ok) {
      await removeFile(destination);
      return report(result, { url, destination });
    }

    let size: number;
    try {
      size = (await stat(destination)).size;
    } catch (err) {
      await removeFile(destination);
      return report(failed('IOFailure', `Cannot inspect ${destination}: ${errorMessage(err)}`), { url });
    }

    if (size === 0) {
      await removeFile(destination);
      return report(failed('EmptyResult', 'Error downloading file: Empty file'), { url, destination });
    }

    log.info('Download complete', { url, destination, bytes: size });
    return completed();
  }

  private async execute(
    url: string,
    file: FileHandle,
    session: TransportSession,
    context: OperationContext,
  ): Promise<OperationResult> {
    const onProgress = context.createProgressCallback();
    const stop = new AbortController();
    let cancelled = false;
    let totalExpected = 0;
    let totalSoFar = 0;

    // A stalled body never reaches the meter, so abort requests are handled here too
    const onAbort = () => {
      if (cancelled || !onProgress(totalExpected, totalSoFar)) return;
      cancelled = true;
      session.abort();
      stop.abort();
    };
    context.on('abort', onAbort);
    if (context.isAbortRequested()) onAbort();

    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        redirect: 'follow',
        signal: session.signal,
      });

      if (cancelled) {
        return failed('Cancelled', 'Download cancelled');
      }
      if (!response.ok) {
        return failed('TransportFailure', `Error downloading file: HTTP ${response.status} ${response.statusText}`.trim());
      }
      if (!response.body) {
        return failed('TransportFailure', 'Error downloading file: response body missing');
      }

      totalExpected = parseContentLength(response.headers);

      const meter = new Transform({
        highWaterMark: this.receiveBufferBytes,
        transform(chunk: Buffer, _encoding, callback) {
          totalSoFar += chunk.length;
          if (onProgress(totalExpected, totalSoFar)) {
            cancelled = true;
            session.abort();
            stop.abort();
            callback(new Error('Download cancelled'));
            return;
          }
          callback(null, chunk);
        },
      });

      const body = Readable.fromWeb(
        response.body as unknown as NodeReadableStream<Uint8Array>,
        { highWaterMark: this.receiveBufferBytes },
      );
      await pipeline(body, meter, file.createWriteStream(), { signal: stop.signal });
      return completed();
    } catch (err) {
      if (cancelled) {
        return failed('Cancelled', 'Download cancelled');
      }
      return failed('TransportFailure', `Error downloading file: ${errorMessage(err)}`);
    } finally {
      context.off('abort', onAbort);
    }
  }
}

function parseContentLength(headers: Headers): number {
  const value = headers.get('Content-Length');
  if (!value) return 0;
  const length = parseInt(value, 10);
  return Number.isNaN(length) ? 0 : length;
}

async function closeFile(file: FileHandle, filePath: string): Promise<void> {
  try {
    await file.close();
  } catch (err) {
    log.error('Failed to close download file', { path: filePath, error: errorMessage(err) });
  }
}

async function removeFile(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    log.error('Failed to remove incomplete download', { path: filePath, error: errorMessage(err) });
  }
}

function report(result: OperationResult, meta: Record<string, unknown>): OperationResult {
  if (result.outcome === 'cancelled') {
    log.info(result.message ?? 'Download cancelled', meta);
  } else {
    log.error(result.message ?? 'Download failed', { ...meta, failure: result.failure });
  }
  return result;
}
