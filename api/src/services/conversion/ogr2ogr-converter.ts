import { execFile } from 'child_process';
import fs from 'fs/promises';
import path from 'path';
import { promisify } from 'util';
import { inlineParameters } from '../../database/sql';
import { ConversionError, ParameterizedQuery } from '../../types';
import { conversionLogger as logger } from '../../utils/logger';
import { GeometryConverter } from './geometry-converter';

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<ProcessOutput>;

const execFileAsync = promisify(execFile);

export const defaultRunner: ProcessRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: options.timeout,
    maxBuffer: 16 * 1024 * 1024,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

export interface Ogr2OgrOptions {
  binary: string;
  connectionString: string;
  srid: number;
  encoding: string;
  geometryColumn: string;
  layerName: string;
  timeoutMs: number;
  runner?: ProcessRunner;
}

/**
 * Shapefiles under `dir` (searched recursively), ordered by relative path.
 */
export async function listShapefiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { recursive: true });
  return entries
    .filter((entry) => entry.toLowerCase().endsWith('.shp'))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Picks the first shapefile by relative path. Archives carrying several
 * shapefiles import only that one; the rest are logged.
 */
export async function findShapefile(dir: string): Promise<string | null> {
  const candidates = await listShapefiles(dir);
  if (candidates.length === 0) {
    return null;
  }
  if (candidates.length > 1) {
    logger.warn({ candidates, chosen: candidates[0] }, 'Archive contains several shapefiles, importing the first');
  }
  return path.join(dir, candidates[0]);
}

const stderrOf = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr;
  }
  return '';
};

// The error message repeats the command line, DSN included, so only the
// exit status is reported when stderr is empty.
const exitStatusOf = (error: unknown): string => {
  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'number') {
      return `exited with code ${error.code}`;
    }
    if ('signal' in error && typeof error.signal === 'string') {
      return `terminated by ${error.signal}`;
    }
    if ('code' in error && typeof error.code === 'string') {
      return `could not be started (${error.code})`;
    }
  }
  return 'exited abnormally';
};

const timedOut = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;

export class Ogr2OgrConverter implements GeometryConverter {
  private readonly runner: ProcessRunner;

  constructor(private readonly options: Ogr2OgrOptions) {
    this.runner = options.runner ?? defaultRunner;
  }

  private get pgSource(): string {
    return `PG:${this.options.connectionString}`;
  }

  buildImportArgs(shapefile: string, stagingRelation: string): string[] {
    const { encoding, geometryColumn, srid } = this.options;
    return [
      '-f', 'PostgreSQL',
      this.pgSource,
      shapefile,
      '-nln', stagingRelation,
      '-overwrite',
      '-lco', `GEOMETRY_NAME=${geometryColumn}`,
      '-lco', `ENCODING=${encoding}`,
      '-t_srs', `EPSG:${srid}`,
    ];
  }

  buildExportArgs(sql: string, outputPath: string): string[] {
    const { encoding, layerName, srid } = this.options;
    return [
      '-f', 'ESRI Shapefile',
      outputPath,
      this.pgSource,
      '-sql', sql,
      '-nln', layerName,
      '-lco', `ENCODING=${encoding}`,
      '-t_srs', `EPSG:${srid}`,
    ];
  }

  async importToStaging(sourceDir: string, stagingRelation: string): Promise<void> {
    const shapefile = await findShapefile(sourceDir);
    if (!shapefile) {
      throw new ConversionError('No .shp file found inside the archive');
    }

    logger.info({ shapefile: path.relative(sourceDir, shapefile), stagingRelation }, 'Importing shapefile into staging');
    await this.run(this.buildImportArgs(shapefile, stagingRelation), 'import');
  }

  async exportFromQuery(query: ParameterizedQuery, destDir: string): Promise<string> {
    const outputPath = path.join(destDir, `${this.options.layerName}.shp`);
    const sql = inlineParameters(query);

    logger.info({ sql, outputPath }, 'Exporting query to shapefile');
    await this.run(this.buildExportArgs(sql, outputPath), 'export');
    return outputPath;
  }

  /**
   * Report the tool version; used by the start-up health validation.
   */
  async version(): Promise<string> {
    const { stdout } = await this.runner(this.options.binary, ['--version'], { timeout: 10000 });
    return stdout.trim();
  }

  private async run(args: string[], mode: 'import' | 'export'): Promise<void> {
    const start = Date.now();
    try {
      const { stderr } = await this.runner(this.options.binary, args, { timeout: this.options.timeoutMs });
      if (stderr.trim()) {
        logger.debug({ mode, stderr }, 'ogr2ogr reported warnings');
      }
      logger.info({ mode, duration: Date.now() - start }, 'ogr2ogr finished');
    } catch (error) {
      const stderr = stderrOf(error);
      if (timedOut(error)) {
        throw new ConversionError(`ogr2ogr ${mode} timed out after ${this.options.timeoutMs}ms`, stderr, { mode });
      }
      const reason = stderr.trim() || exitStatusOf(error);
      throw new ConversionError(`ogr2ogr ${mode} failed: ${reason}`, stderr, { mode });
    }
  }
}
