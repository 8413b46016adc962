import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import JSZip from 'jszip';
import fs from 'fs/promises';
import { BadInputError, ConversionError, PayloadTooLargeError } from '../../types';
import { makeTempRoot, shapefileArchive } from '../../test-support/archives';
import { FakeGeometryConverter } from '../../test-support/fake-converter';
import { InMemorySpatialDatabase } from '../../test-support/in-memory-database';
import { StagingLock } from '../reconciliation/staging-lock';
import { WorkspaceManager } from '../workspace/workspace-manager';
import { IngestionService } from './ingestion-service';

const TARGET = 'public.tapak_proyek';
const STAGING = 'public.staging_tapak_upload';

const layerOf = (count: number, prefix: string) => ({
  columns: ['ogc_fid', 'NAMA', 'Luas', 'geom'],
  rows: Array.from({ length: count }, (_, index) => ({
    ogc_fid: index + 1,
    NAMA: `${prefix}-${index + 1}`,
    Luas: (index + 1) * 10,
    geom: `POINT(${index} ${index})`,
  })),
});

describe('IngestionService', () => {
  let root: string;
  let db: InMemorySpatialDatabase;
  let converter: FakeGeometryConverter;
  let service: IngestionService;

  beforeEach(async () => {
    root = await makeTempRoot('ingest-test');
    db = new InMemorySpatialDatabase();
    db.defineTable(TARGET, ['id', 'nama', 'luas', 'status', 'geom']);
    converter = new FakeGeometryConverter(db);
    service = new IngestionService(db, converter, new WorkspaceManager(root), new StagingLock(), {
      targetRelation: TARGET,
      stagingRelation: STAGING,
      idColumn: 'id',
      maxUploadBytes: 1024 * 1024,
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('merges the upload into the target and empties staging', async () => {
    const buffer = await shapefileArchive(layerOf(3, 'blok'));

    const result = await service.ingest({ originalName: 'tapak.ZIP', buffer });

    expect(result).toEqual({ status: 'ok', inserted_rows: 3 });
    expect(db.rows(TARGET)[0]).toEqual({ id: 1, nama: 'blok-1', luas: 10, status: null, geom: 'POINT(0 0)' });
    expect(db.rows(STAGING)).toEqual([]);
    expect(db.columns(STAGING)).toEqual(['ogc_fid', 'NAMA', 'Luas', 'geom']);
    expect(converter.imports).toEqual([{ shapefile: 'parcels.shp', stagingRelation: STAGING }]);
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('rejects non-zip uploads before touching the disk', async () => {
    const buffer = await shapefileArchive(layerOf(1, 'blok'));

    await expect(service.ingest({ originalName: 'tapak.shp', buffer })).rejects.toMatchObject({
      code: 'INVALID_FILE_TYPE',
      statusCode: 400,
    });
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('rejects oversized uploads', async () => {
    const small = new IngestionService(db, converter, new WorkspaceManager(root), new StagingLock(), {
      targetRelation: TARGET,
      stagingRelation: STAGING,
      idColumn: 'id',
      maxUploadBytes: 10,
    });

    await expect(small.ingest({ originalName: 'tapak.zip', buffer: Buffer.alloc(11) }))
      .rejects.toBeInstanceOf(PayloadTooLargeError);
  });

  it('cleans up after a malformed archive', async () => {
    await expect(service.ingest({ originalName: 'tapak.zip', buffer: Buffer.from('not a zip') }))
      .rejects.toBeInstanceOf(BadInputError);
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('reports an archive without a shapefile as a conversion failure', async () => {
    const buffer = await new JSZip().generateAsync({ type: 'nodebuffer' });

    const error = await service.ingest({ originalName: 'empty.zip', buffer }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ message: 'No .shp file found inside the archive', statusCode: 500 });
    expect(converter.imports).toEqual([]);
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('cleans up after a conversion failure and leaves the target untouched', async () => {
    converter.failImportWith = 'ERROR 1: Unable to open datasource';
    const buffer = await shapefileArchive(layerOf(2, 'blok'));

    await expect(service.ingest({ originalName: 'tapak.zip', buffer })).rejects.toBeInstanceOf(ConversionError);
    expect(db.rows(TARGET)).toEqual([]);
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('rolls back the merge when truncating staging fails', async () => {
    db.failOn = /^TRUNCATE/;
    const buffer = await shapefileArchive(layerOf(2, 'blok'));

    await expect(service.ingest({ originalName: 'tapak.zip', buffer })).rejects.toThrow('Simulated database failure');
    expect(db.rows(TARGET)).toEqual([]);
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('keeps concurrent uploads from mixing their staged rows', async () => {
    converter.importDelayMs = 20;
    const sizes = [3, 5, 2, 4];
    const archives = await Promise.all(sizes.map((size, index) => shapefileArchive(layerOf(size, `u${index}`))));

    const results = await Promise.all(
      archives.map((buffer, index) => service.ingest({ originalName: `upload-${index}.zip`, buffer }))
    );

    expect(results.map((result) => result.inserted_rows)).toEqual(sizes);
    expect(db.rows(TARGET)).toHaveLength(14);
    sizes.forEach((size, index) => {
      const names = db.rows(TARGET).filter((row) => String(row.nama).startsWith(`u${index}-`));
      expect(names).toHaveLength(size);
    });
    expect(db.rows(STAGING)).toEqual([]);
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });
});
