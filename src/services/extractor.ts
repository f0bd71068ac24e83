import { mkdir, open, rm, type FileHandle } from 'fs/promises';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { errorMessage, Logger } from '../helpers/logger';
import {
  hasReservedSuffix,
  isDirectoryMarker,
  isWithinRoot,
  parentDirectory,
  sanitizeEntryPath,
  withTrailingSeparator,
} from '../helpers/paths';
import { ENTRY_CHUNK_SIZE, ZipArchive } from '../helpers/zip';
import type { ZipEntry } from '../helpers/zip';
import { completed, failed } from '../types/operations';
import type { ExtractionRequest, OperationResult } from '../types/operations';
import { OperationContext } from './progress';

const log = new Logger('extract');

/** The subset of {@link ZipArchive} the extractor relies on. */
export interface ArchiveReader {
  entries(): readonly ZipEntry[];
  openEntry(entry: ZipEntry): Promise<Readable>;
  close(): Promise<void>;
}

export type ArchiveOpener = (archivePath: string) => Promise<ArchiveReader>;

export interface ExtractorOptions {
  context?: OperationContext;
  openArchive?: ArchiveOpener;
}

type EntryStatus = 'extracted' | 'skipped' | 'failed';

/**
 * Expands a ZIP archive into a directory tree, one entry at a time.
 *
 * A failing entry is logged and counted against the overall result, but the
 * remaining entries are still extracted. Cancellation is checked before each
 * entry; the entry in progress always finishes first.
 */
export class ArchiveExtractor {
  readonly context: OperationContext;
  private readonly openArchive: ArchiveOpener;

  constructor(options: ExtractorOptions = {}) {
    this.context = options.context ?? new OperationContext('extract');
    this.openArchive = options.openArchive ?? ((archivePath) => ZipArchive.open(archivePath));
  }

  async extract(archivePath: string, destinationDir: string, context?: OperationContext): Promise<boolean> {
    const result = await this.unpack({ archivePath, destinationDir }, context);
    return result.ok;
  }

  async unpack(request: ExtractionRequest, context: OperationContext = this.context): Promise<OperationResult> {
    context.resetAbort();
    context.monitor.reset();
    const { archivePath } = request;
    const destinationDir = withTrailingSeparator(request.destinationDir);

    let archive: ArchiveReader;
    try {
      archive = await this.openArchive(archivePath);
    } catch (err) {
      log.error('Error opening archive', { archivePath, error: errorMessage(err) });
      return failed('IOFailure', `Error opening archive: ${archivePath}`);
    }

    const entries = archive.entries();
    let failures = 0;
    let extracted = 0;
    let cancelled = false;

    try {
      for (let i = 0; i < entries.length; i++) {
        if (context.consumeAbort()) {
          cancelled = true;
          break;
        }

        const status = await this.extractEntry(archive, entries[i], destinationDir);
        if (status === 'failed') failures++;
        if (status === 'extracted') extracted++;

        context.monitor.update(entries.length, i + 1);
      }
    } finally {
      await archive.close();
    }

    if (cancelled) {
      log.info('Extraction cancelled', { archivePath, extracted, failures });
      return failed('Cancelled', 'Extraction cancelled');
    }

    if (failures > 0) {
      log.warn('Extraction finished with errors', { archivePath, extracted, failures });
      return failed('IOFailure', `${failures} archive ${failures === 1 ? 'entry' : 'entries'} could not be extracted`);
    }

    log.info('Extraction complete', { archivePath, destinationDir, extracted });
    return completed();
  }

  private async extractEntry(archive: ArchiveReader, entry: ZipEntry, destinationDir: string): Promise<EntryStatus> {
    if (entry.name.length === 0) return 'skipped';

    const rawPath = destinationDir + entry.name;
    if (hasReservedSuffix(rawPath)) return 'skipped';

    const target = sanitizeEntryPath(rawPath);
    if (isDirectoryMarker(target)) return 'skipped';

    if (!isWithinRoot(target, sanitizeEntryPath(destinationDir))) {
      log.error('Archive entry escapes destination', { entry: entry.name, target });
      return 'failed';
    }

    try {
      await mkdir(parentDirectory(target), { recursive: true });
    } catch (err) {
      log.error('Error creating directory', { path: parentDirectory(target), error: errorMessage(err) });
      return 'failed';
    }

    let source: Readable;
    try {
      source = await archive.openEntry(entry);
    } catch (err) {
      log.error('Error opening file in archive', { entry: entry.name, error: errorMessage(err) });
      return 'failed';
    }

    let output: FileHandle;
    try {
      output = await open(target, 'w');
    } catch (err) {
      source.destroy();
      log.error('Error opening output file', { path: target, error: errorMessage(err) });
      return 'failed';
    }

    const copied = await pipeline(source, output.createWriteStream({ highWaterMark: ENTRY_CHUNK_SIZE })).then(
      () => true,
      (err: unknown) => {
        log.error('Error extracting file', { entry: entry.name, path: target, error: errorMessage(err) });
        return false;
      },
    );
    await output.close();

    if (copied) return 'extracted';
    await rm(target, { force: true });
    return 'failed';
  }
}
