// ZIP container reader.
//
// Only the central directory is read when the archive is opened. Entry data
// is streamed on demand straight from disk in small chunks, so an archive is
// never held in memory as a whole. Deflated entries are inflated with fflate.

import fs from 'fs';
import { open, type FileHandle } from 'fs/promises';
import { Readable, Transform } from 'stream';
import { Inflate } from 'fflate';

/** Read size used for every entry stream. */
export const ENTRY_CHUNK_SIZE = 4096;

const METHOD_STORED = 0;
const METHOD_DEFLATED = 8;

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const ZIP64_EOCD_SIZE = 56;
const ZIP64_EXTRA_ID = 0x0001;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const CENTRAL_HEADER_SIZE = 46;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const LOCAL_HEADER_SIZE = 30;
const FLAG_ENCRYPTED = 0x0001;

export interface ZipEntry {
  name: string;
  isDirectory: boolean;
  method: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
  encrypted: boolean;
}

interface CentralDirectoryLocation {
  count: number;
  offset: number;
  size: number;
}

export class ZipArchive {
  private constructor(
    readonly filePath: string,
    private readonly handle: FileHandle,
    private readonly index: ZipEntry[],
  ) {}

  static async open(filePath: string): Promise<ZipArchive> {
    const handle = await open(filePath, 'r');
    try {
      const { size } = await handle.stat();
      const location = await locateCentralDirectory(handle, size);
      const entries = await readCentralDirectory(handle, location);
      return new ZipArchive(filePath, handle, entries);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  /** Entries in central-directory order. */
  entries(): readonly ZipEntry[] {
    return this.index;
  }

  /**
   * Stream the uncompressed bytes of `entry`. Rejects when the entry cannot
   * be read at all: encrypted, compressed with an unsupported method, or
   * pointing at a damaged local header.
   */
  async openEntry(entry: ZipEntry): Promise<Readable> {
    if (entry.encrypted) {
      throw new Error(`Entry ${entry.name} is encrypted`);
    }
    if (entry.method !== METHOD_STORED && entry.method !== METHOD_DEFLATED) {
      throw new Error(`Unsupported compression method ${entry.method} for ${entry.name}`);
    }

    const header = await readAt(this.handle, entry.localHeaderOffset, LOCAL_HEADER_SIZE);
    if (header.readUInt32LE(0) !== LOCAL_HEADER_SIGNATURE) {
      throw new Error(`Invalid local file header for ${entry.name}`);
    }

    const dataOffset = entry.localHeaderOffset + LOCAL_HEADER_SIZE
      + header.readUInt16LE(26) + header.readUInt16LE(28);

    const raw = entry.compressedSize === 0
      ? Readable.from([])
      : fs.createReadStream(this.filePath, {
        start: dataOffset,
        end: dataOffset + entry.compressedSize - 1,
        highWaterMark: ENTRY_CHUNK_SIZE,
      });

    if (entry.method === METHOD_STORED) return raw;

    const inflate = createInflateStream();
    raw.on('error', (err: Error) => inflate.destroy(err));
    // pipe() never tears the source down, and the source holds a descriptor
    inflate.on('close', () => raw.destroy());
    return raw.pipe(inflate);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  if (bytesRead < length) {
    throw new Error('Unexpected end of archive');
  }
  return buffer;
}

async function locateCentralDirectory(handle: FileHandle, size: number): Promise<CentralDirectoryLocation> {
  if (size < EOCD_SIZE) {
    throw new Error('Not a ZIP archive: file too small');
  }

  const tailLength = Math.min(size, EOCD_SIZE + MAX_COMMENT_LENGTH);
  const tailStart = size - tailLength;
  const tail = await readAt(handle, tailStart, tailLength);

  let eocd = -1;
  for (let i = tail.length - EOCD_SIZE; i >= 0; i--) {
    if (tail.readUInt32LE(i) === EOCD_SIGNATURE) {
      eocd = i;
      break;
    }
  }
  if (eocd === -1) {
    throw new Error('Not a ZIP archive: end of central directory not found');
  }

  const location: CentralDirectoryLocation = {
    count: tail.readUInt16LE(eocd + 10),
    size: tail.readUInt32LE(eocd + 12),
    offset: tail.readUInt32LE(eocd + 16),
  };

  const needsZip64 = location.count === 0xffff
    || location.size === 0xffffffff
    || location.offset === 0xffffffff;
  const locatorPosition = tailStart + eocd - ZIP64_LOCATOR_SIZE;
  if (!needsZip64 || locatorPosition < 0) return location;

  const locator = await readAt(handle, locatorPosition, ZIP64_LOCATOR_SIZE);
  if (locator.readUInt32LE(0) !== ZIP64_LOCATOR_SIGNATURE) return location;

  const record = await readAt(handle, Number(locator.readBigUInt64LE(8)), ZIP64_EOCD_SIZE);
  if (record.readUInt32LE(0) !== ZIP64_EOCD_SIGNATURE) {
    throw new Error('Invalid ZIP64 end of central directory record');
  }

  return {
    count: Number(record.readBigUInt64LE(32)),
    size: Number(record.readBigUInt64LE(40)),
    offset: Number(record.readBigUInt64LE(48)),
  };
}

async function readCentralDirectory(
  handle: FileHandle,
  location: CentralDirectoryLocation,
): Promise<ZipEntry[]> {
  const buffer = await readAt(handle, location.offset, location.size);
  const entries: ZipEntry[] = [];
  let pos = 0;

  for (let i = 0; i < location.count; i++) {
    if (pos + CENTRAL_HEADER_SIZE > buffer.length || buffer.readUInt32LE(pos) !== CENTRAL_HEADER_SIGNATURE) {
      throw new Error(`Corrupt central directory at entry ${i}`);
    }

    const flags = buffer.readUInt16LE(pos + 8);
    const method = buffer.readUInt16LE(pos + 10);
    let compressedSize = buffer.readUInt32LE(pos + 20);
    let uncompressedSize = buffer.readUInt32LE(pos + 24);
    const nameLength = buffer.readUInt16LE(pos + 28);
    const extraLength = buffer.readUInt16LE(pos + 30);
    const commentLength = buffer.readUInt16LE(pos + 32);
    let localHeaderOffset = buffer.readUInt32LE(pos + 42);

    const nameStart = pos + CENTRAL_HEADER_SIZE;
    const name = buffer.toString('utf8', nameStart, nameStart + nameLength);

    // ZIP64 extra field: only the values saturated in the fixed header are present, in this order
    const extraStart = nameStart + nameLength;
    const extraEnd = extraStart + extraLength;
    let fieldPos = extraStart;
    while (fieldPos + 4 <= extraEnd) {
      const id = buffer.readUInt16LE(fieldPos);
      const fieldSize = buffer.readUInt16LE(fieldPos + 2);
      if (id === ZIP64_EXTRA_ID) {
        let p = fieldPos + 4;
        const fieldEnd = p + fieldSize;
        if (uncompressedSize === 0xffffffff && p + 8 <= fieldEnd) {
          uncompressedSize = Number(buffer.readBigUInt64LE(p));
          p += 8;
        }
        if (compressedSize === 0xffffffff && p + 8 <= fieldEnd) {
          compressedSize = Number(buffer.readBigUInt64LE(p));
          p += 8;
        }
        if (localHeaderOffset === 0xffffffff && p + 8 <= fieldEnd) {
          localHeaderOffset = Number(buffer.readBigUInt64LE(p));
        }
        break;
      }
      fieldPos += 4 + fieldSize;
    }

    entries.push({
      name,
      isDirectory: name.endsWith('/'),
      method,
      compressedSize,
      uncompressedSize,
      localHeaderOffset,
      encrypted: (flags & FLAG_ENCRYPTED) !== 0,
    });

    pos = extraEnd + commentLength;
  }

  return entries;
}

function createInflateStream(): Transform {
  const inflater = new Inflate();
  const stream = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      try {
        inflater.push(chunk);
        callback();
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
      }
    },
    flush(callback) {
      try {
        inflater.push(new Uint8Array(0), true);
        callback();
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
      }
    },
  });

  inflater.ondata = (data: Uint8Array) => {
    if (data.length > 0) stream.push(Buffer.from(data));
  };

  return stream;
}
