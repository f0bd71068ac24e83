import { readdirSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { buffer } from 'stream/consumers';
import { strToU8, zipSync } from 'fflate';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZipArchive } from './zip';

const CENTRAL_HEADER = Buffer.from([0x50, 0x4b, 0x01, 0x02]);

function patchCentralMethod(zip: Uint8Array, entryIndex: number, method: number): Buffer {
  const bytes = Buffer.from(zip);
  let offset = -1;
  for (let i = 0; i <= entryIndex; i++) {
    offset = bytes.indexOf(CENTRAL_HEADER, offset + 1);
  }
  bytes.writeUInt16LE(method, offset + 10);
  return bytes;
}

function noise(size: number): Uint8Array {
  const bytes = new Uint8Array(size);
  let seed = 7;
  for (let i = 0; i < size; i++) {
    seed = (Math.imul(seed, 1103515245) + 12345) & 0x7fffffff;
    bytes[i] = (seed >> 16) & 0xff;
  }
  return bytes;
}

describe('ZipArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'payload-bridge-zip-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeArchive(name: string, bytes: Uint8Array): Promise<string> {
    const archivePath = path.join(dir, name);
    await writeFile(archivePath, bytes);
    return archivePath;
  }

  it('indexes entries in archive order', async () => {
    const archivePath = await writeArchive('layout.zip', zipSync({
      'top.txt': strToU8('top level'),
      docs: { 'readme.txt': [strToU8('stored text'), { level: 0 }] },
    }));

    const archive = await ZipArchive.open(archivePath);
    try {
      const entries = archive.entries();
      expect(entries.map(e => e.name)).toEqual(['top.txt', 'docs/', 'docs/readme.txt']);
      expect(entries.map(e => e.isDirectory)).toEqual([false, true, false]);
      expect(entries[0].method).toBe(8);
      expect(entries[0].uncompressedSize).toBe(9);
      expect(entries[2].method).toBe(0);
      expect(entries[2].compressedSize).toBe(11);
      expect(entries.every(e => !e.encrypted)).toBe(true);
    } finally {
      await archive.close();
    }
  });

  it('streams stored and deflated entries', async () => {
    const archivePath = await writeArchive('mixed.zip', zipSync({
      'deflated.txt': strToU8('deflated contents'),
      'stored.txt': [strToU8('stored contents'), { level: 0 }],
    }));

    const archive = await ZipArchive.open(archivePath);
    try {
      const [deflated, stored] = archive.entries();
      expect((await buffer(await archive.openEntry(deflated))).toString()).toBe('deflated contents');
      expect((await buffer(await archive.openEntry(stored))).toString()).toBe('stored contents');
    } finally {
      await archive.close();
    }
  });

  it('reproduces entries larger than one read chunk byte for byte', async () => {
    const payload = new Uint8Array(50_000);
    for (let i = 0; i < payload.length; i++) payload[i] = (i * 31 + (i >> 7)) & 0xff;

    const archivePath = await writeArchive('large.zip', zipSync({
      'large.bin': payload,
      'large-stored.bin': [payload, { level: 0 }],
    }));

    const archive = await ZipArchive.open(archivePath);
    try {
      for (const entry of archive.entries()) {
        const data = await buffer(await archive.openEntry(entry));
        expect(data.equals(Buffer.from(payload))).toBe(true);
      }
    } finally {
      await archive.close();
    }
  });

  it('opens empty entries', async () => {
    const archivePath = await writeArchive('empty.zip', zipSync({
      'empty.txt': [new Uint8Array(0), { level: 0 }],
    }));

    const archive = await ZipArchive.open(archivePath);
    try {
      const data = await buffer(await archive.openEntry(archive.entries()[0]));
      expect(data.length).toBe(0);
    } finally {
      await archive.close();
    }
  });

  it('refuses entries with an unsupported compression method', async () => {
    const zip = zipSync({
      'first.txt': [strToU8('one'), { level: 0 }],
      'second.txt': [strToU8('two'), { level: 0 }],
    });
    const archivePath = await writeArchive('method.zip', patchCentralMethod(zip, 1, 12));

    const archive = await ZipArchive.open(archivePath);
    try {
      const [first, second] = archive.entries();
      expect(second.method).toBe(12);
      await expect(archive.openEntry(second)).rejects.toThrow('Unsupported compression method 12 for second.txt');
      expect((await buffer(await archive.openEntry(first))).toString()).toBe('one');
    } finally {
      await archive.close();
    }
  });

  it.skipIf(process.platform !== 'linux')('releases the file descriptor when inflating fails', async () => {
    const zip = Buffer.from(zipSync({ 'noise.bin': noise(200_000) }));
    // first deflate byte: final block with the reserved block type
    zip[30 + zip.readUInt16LE(26) + zip.readUInt16LE(28)] = 0xff;
    const archivePath = await writeArchive('corrupt.zip', zip);
    const openDescriptors = () => readdirSync('/proc/self/fd').length;

    const archive = await ZipArchive.open(archivePath);
    try {
      const [entry] = archive.entries();
      const before = openDescriptors();
      for (let i = 0; i < 5; i++) {
        await expect(buffer(await archive.openEntry(entry))).rejects.toThrow();
      }
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(openDescriptors()).toBe(before);
    } finally {
      await archive.close();
    }
  });

  it.skipIf(process.platform !== 'linux')('releases the file descriptor when the caller abandons an entry', async () => {
    const archivePath = await writeArchive('abandoned.zip', zipSync({ 'noise.bin': noise(200_000) }));
    const openDescriptors = () => readdirSync('/proc/self/fd').length;

    const archive = await ZipArchive.open(archivePath);
    try {
      const before = openDescriptors();
      const stream = await archive.openEntry(archive.entries()[0]);
      await new Promise((resolve) => stream.once('readable', resolve));
      stream.destroy();
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(openDescriptors()).toBe(before);
    } finally {
      await archive.close();
    }
  });

  it('rejects files that are not ZIP archives', async () => {
    const notZip = await writeArchive('notes.zip', strToU8('just some text that is long enough to scan'));
    await expect(ZipArchive.open(notZip)).rejects.toThrow('end of central directory not found');

    const tiny = await writeArchive('tiny.zip', strToU8('PK'));
    await expect(ZipArchive.open(tiny)).rejects.toThrow('file too small');
  });

  it('rejects a missing archive', async () => {
    await expect(ZipArchive.open(path.join(dir, 'absent.zip'))).rejects.toThrow();
  });
});
