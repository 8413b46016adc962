import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import JSZip from 'jszip';
import fs from 'fs/promises';
import path from 'path';
import { BadInputError, PayloadTooLargeError } from '../../types';
import { makeTempRoot } from '../../test-support/archives';
import { extractArchive } from './archive-extractor';

const MAX = 1024 * 1024;

describe('extractArchive', () => {
  let root: string;
  let dest: string;

  beforeEach(async () => {
    root = await makeTempRoot('extract-test');
    dest = path.join(root, 'extracted');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('writes every entry, including nested folders', async () => {
    const zip = new JSZip();
    zip.file('parcels.shp', 'shp');
    zip.file('parcels.dbf', 'dbf');
    zip.file('meta/readme.txt', 'hello');

    const files = await extractArchive(await zip.generateAsync({ type: 'nodebuffer' }), dest, { maxBytes: MAX });

    expect([...files].sort()).toEqual(['meta/readme.txt', 'parcels.dbf', 'parcels.shp'].map((file) => path.normalize(file)));
    await expect(fs.readFile(path.join(dest, 'meta', 'readme.txt'), 'utf8')).resolves.toBe('hello');
  });

  it('creates the destination for an archive without entries', async () => {
    const buffer = await new JSZip().generateAsync({ type: 'nodebuffer' });

    await expect(extractArchive(buffer, dest, { maxBytes: MAX })).resolves.toEqual([]);
    await expect(fs.readdir(dest)).resolves.toEqual([]);
  });

  it('rejects an oversized payload before writing anything', async () => {
    const zip = new JSZip();
    zip.file('parcels.shp', 'x'.repeat(4096));
    const buffer = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(extractArchive(buffer, dest, { maxBytes: 16 })).rejects.toBeInstanceOf(PayloadTooLargeError);
    await expect(fs.access(dest)).rejects.toThrow();
  });

  it('reports a malformed archive as bad input', async () => {
    const error = await extractArchive(Buffer.from('definitely not a zip'), dest, { maxBytes: MAX })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BadInputError);
    expect(error).toMatchObject({ code: 'INVALID_ARCHIVE', statusCode: 400 });
  });

  it('refuses entries that climb out of the destination', async () => {
    const zip = new JSZip();
    zip.file('parcels.shp', 'shp');
    zip.file('../escaped.shp', 'evil');
    const buffer = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(extractArchive(buffer, dest, { maxBytes: MAX })).rejects.toBeInstanceOf(BadInputError);
    await expect(fs.access(path.join(root, 'escaped.shp'))).rejects.toThrow();
    await expect(fs.access(path.join(dest, 'parcels.shp'))).rejects.toThrow();
  });
});
