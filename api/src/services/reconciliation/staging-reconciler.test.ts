import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidRelationError, NothingToInsertError } from '../../types';
import { InMemorySpatialDatabase } from '../../test-support/in-memory-database';
import { buildColumnMapping, buildMergeStatement, reconcile, truncateStaging } from './staging-reconciler';

const TARGET = 'public.tapak_proyek';
const STAGING = 'public.staging_tapak_upload';

describe('buildColumnMapping', () => {
  it('skips the identifier column and maps the rest in target order', () => {
    expect(buildColumnMapping(['id', 'nama', 'geom'], ['geom', 'nama'], 'id')).toEqual([
      { targetColumn: 'nama', sourceColumn: 'nama' },
      { targetColumn: 'geom', sourceColumn: 'geom' },
    ]);
  });

  it('matches names case-insensitively and keeps the staging spelling', () => {
    expect(buildColumnMapping(['id', 'nama', 'luas_ha'], ['Nama', 'LUAS_HA'], 'id')).toEqual([
      { targetColumn: 'nama', sourceColumn: 'Nama' },
      { targetColumn: 'luas_ha', sourceColumn: 'LUAS_HA' },
    ]);
  });

  it('fills target columns missing from staging with NULL and ignores staging extras', () => {
    const mapping = buildColumnMapping(['id', 'nama', 'status'], ['nama', 'ogc_fid', 'remark'], 'id');

    expect(mapping).toEqual([
      { targetColumn: 'nama', sourceColumn: 'nama' },
      { targetColumn: 'status', sourceColumn: null },
    ]);
  });

  it('lets the last of two case-variant staging columns win', () => {
    expect(buildColumnMapping(['id', 'nama'], ['NAMA', 'nama', 'Nama'], 'id')).toEqual([
      { targetColumn: 'nama', sourceColumn: 'Nama' },
    ]);
  });

  it('excludes the identifier only by exact name', () => {
    expect(buildColumnMapping(['ID', 'nama'], ['ID', 'nama'], 'id')).toEqual([
      { targetColumn: 'ID', sourceColumn: 'ID' },
      { targetColumn: 'nama', sourceColumn: 'nama' },
    ]);
  });
});

describe('buildMergeStatement', () => {
  it('renders a single quoted INSERT ... SELECT', () => {
    const sql = buildMergeStatement(TARGET, STAGING, [
      { targetColumn: 'nama', sourceColumn: 'Nama' },
      { targetColumn: 'status', sourceColumn: null },
      { targetColumn: 'geom', sourceColumn: 'geom' },
    ]);

    expect(sql).toBe(
      'INSERT INTO "public"."tapak_proyek" ("nama", "status", "geom") ' +
      'SELECT "Nama" AS "nama", NULL AS "status", "geom" AS "geom" FROM "public"."staging_tapak_upload"'
    );
  });
});

describe('reconcile', () => {
  let db: InMemorySpatialDatabase;

  beforeEach(() => {
    db = new InMemorySpatialDatabase();
    db.defineTable(TARGET, ['id', 'nama', 'luas', 'status', 'geom']);
  });

  it('inserts every staging row and grows the target by the same count', async () => {
    db.defineTable(STAGING, ['ogc_fid', 'nama', 'luas', 'status', 'geom'], [
      { ogc_fid: 1, nama: 'Blok A', luas: 10, status: 'aktif', geom: 'POINT(1 1)' },
      { ogc_fid: 2, nama: 'Blok B', luas: 12, status: 'aktif', geom: 'POINT(2 2)' },
      { ogc_fid: 3, nama: 'Blok C', luas: 7, status: 'rencana', geom: 'POINT(3 3)' },
    ]);

    const inserted = await reconcile(db, TARGET, STAGING, { idColumn: 'id' });

    expect(inserted).toBe(3);
    expect(db.rows(TARGET)).toHaveLength(3);
    expect(db.rows(TARGET)[2]).toEqual({ id: 3, nama: 'Blok C', luas: 7, status: 'rencana', geom: 'POINT(3 3)' });
  });

  it('maps differently cased staging columns and fills unmatched ones with null', async () => {
    db.defineTable(STAGING, ['Nama', 'GEOM', 'keterangan'], [
      { Nama: 'Blok A', GEOM: 'POINT(1 1)', keterangan: 'ignored' },
    ]);

    await reconcile(db, TARGET, STAGING, { idColumn: 'id' });

    expect(db.rows(TARGET)).toEqual([
      { id: 1, nama: 'Blok A', luas: null, status: null, geom: 'POINT(1 1)' },
    ]);
    expect(db.statements.at(-1)).not.toContain('keterangan');
  });

  it('reports 0 for an empty staging relation without failing', async () => {
    db.defineTable(STAGING, ['nama', 'geom']);

    await expect(reconcile(db, TARGET, STAGING, { idColumn: 'id' })).resolves.toBe(0);
    expect(db.rows(TARGET)).toEqual([]);
  });

  it('reports 0 when the driver gives no row count', async () => {
    db.defineTable(STAGING, ['nama'], [{ nama: 'Blok A' }]);
    db.reportRowCount = false;

    await expect(reconcile(db, TARGET, STAGING, { idColumn: 'id' })).resolves.toBe(0);
    expect(db.rows(TARGET)).toHaveLength(1);
  });

  it('refuses a target with only the identifier column', async () => {
    db.defineTable('public.ids_only', ['id']);
    db.defineTable(STAGING, ['nama'], [{ nama: 'Blok A' }]);

    await expect(reconcile(db, 'public.ids_only', STAGING, { idColumn: 'id' }))
      .rejects.toBeInstanceOf(NothingToInsertError);
    expect(db.statements.some((sql) => sql.startsWith('INSERT'))).toBe(false);
  });

  it('aborts when the target relation does not exist', async () => {
    db.defineTable(STAGING, ['nama'], [{ nama: 'Blok A' }]);

    await expect(reconcile(db, 'public.missing', STAGING, { idColumn: 'id' }))
      .rejects.toBeInstanceOf(InvalidRelationError);
  });

  it('aborts when the staging relation does not exist', async () => {
    await expect(reconcile(db, TARGET, STAGING, { idColumn: 'id' }))
      .rejects.toBeInstanceOf(InvalidRelationError);
  });

  it('rejects an unqualified relation name', async () => {
    await expect(reconcile(db, 'tapak_proyek', STAGING, { idColumn: 'id' }))
      .rejects.toBeInstanceOf(InvalidRelationError);
  });
});

describe('truncateStaging', () => {
  it('empties the staging relation and keeps its columns', async () => {
    const db = new InMemorySpatialDatabase();
    db.defineTable(STAGING, ['nama', 'geom'], [{ nama: 'Blok A', geom: 'POINT(1 1)' }]);

    await truncateStaging(db, STAGING);

    expect(db.statements).toEqual(['TRUNCATE TABLE "public"."staging_tapak_upload"']);
    expect(db.rows(STAGING)).toEqual([]);
    expect(db.columns(STAGING)).toEqual(['nama', 'geom']);
  });
});
