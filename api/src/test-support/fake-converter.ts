import { randomBytes } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { ConversionError, ParameterizedQuery, Row } from '../types';
import { GeometryConverter } from '../services/conversion/geometry-converter';
import { findShapefile } from '../services/conversion/ogr2ogr-converter';
import { InMemorySpatialDatabase } from './in-memory-database';

export interface StagedLayer {
  columns: string[];
  rows: Row[];
}

const isRecord = (value: unknown): value is Row =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseLayer = (content: string): StagedLayer => {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed) || !Array.isArray(parsed.columns) || !Array.isArray(parsed.rows)) {
    throw new ConversionError('Unreadable layer sidecar');
  }
  return {
    columns: parsed.columns.map((column: unknown) => String(column)),
    rows: parsed.rows.filter(isRecord),
  };
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Converter stand-in. An import reads `<name>.json` beside the chosen
 * `<name>.shp` ({ columns, rows }) and replaces the staging table with it;
 * an export writes a small shapefile set unless told to produce nothing.
 */
export class FakeGeometryConverter implements GeometryConverter {
  readonly imports: Array<{ shapefile: string; stagingRelation: string }> = [];
  readonly exports: Array<{ query: ParameterizedQuery; destDir: string }> = [];

  importDelayMs = 0;
  failImportWith?: string;
  failExportWith?: string;
  exportProducesNothing = false;
  // Incompressible .shp payload size, for exports that take a while to deliver
  exportShapeBytes = 0;
  layerName = 'export_tapak';

  constructor(private readonly db: InMemorySpatialDatabase) {}

  async importToStaging(sourceDir: string, stagingRelation: string): Promise<void> {
    const shapefile = await findShapefile(sourceDir);
    if (!shapefile) {
      throw new ConversionError('No .shp file found inside the archive');
    }
    if (this.failImportWith !== undefined) {
      throw new ConversionError(`ogr2ogr import failed: ${this.failImportWith}`, this.failImportWith);
    }

    this.imports.push({ shapefile: path.relative(sourceDir, shapefile), stagingRelation });
    const layer = parseLayer(await fs.readFile(shapefile.replace(/\.shp$/i, '.json'), 'utf8'));

    if (this.importDelayMs > 0) {
      await delay(this.importDelayMs);
    }
    this.db.defineTable(stagingRelation, layer.columns, layer.rows);
  }

  async exportFromQuery(query: ParameterizedQuery, destDir: string): Promise<string> {
    this.exports.push({ query, destDir });
    if (this.failExportWith !== undefined) {
      throw new ConversionError(`ogr2ogr export failed: ${this.failExportWith}`, this.failExportWith);
    }

    const shapefile = path.join(destDir, `${this.layerName}.shp`);
    if (!this.exportProducesNothing) {
      for (const extension of ['shp', 'shx', 'dbf', 'prj']) {
        const content = extension === 'shp' && this.exportShapeBytes > 0
          ? randomBytes(this.exportShapeBytes)
          : `${extension}:${query.text}`;
        await fs.writeFile(path.join(destDir, `${this.layerName}.${extension}`), content);
      }
    }
    return shapefile;
  }
}
