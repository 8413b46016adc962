import JSZip from 'jszip';
import fs from 'fs/promises';
import { createWriteStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import {
  ConversionError,
  ExportArtifact,
  ExportFailedError,
  ExportSelector,
  NotFoundError,
  Queryable,
} from '../../types';
import { exportLogger as logger } from '../../utils/logger';
import { GeometryConverter } from '../conversion/geometry-converter';
import { WorkspaceHandle, WorkspaceManager } from '../workspace/workspace-manager';
import { archiveNameFor, buildCountQuery, buildSelectionQuery } from './export-selector';

export interface ExportPackagerOptions {
  targetRelation: string;
  idColumn: string;
  filePrefix: string;
}

const exists = async (file: string): Promise<boolean> => {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
};

/**
 * Zip every file of `sourceDir` (flat) into `archivePath`.
 */
export async function zipDirectory(sourceDir: string, archivePath: string): Promise<string[]> {
  const zip = new JSZip();
  const names = (await fs.readdir(sourceDir)).sort();

  for (const name of names) {
    zip.file(name, await fs.readFile(path.join(sourceDir, name)));
  }

  await pipeline(
    zip.generateNodeStream({ type: 'nodebuffer', streamFiles: true, compression: 'DEFLATE' }),
    createWriteStream(archivePath)
  );
  return names;
}

export class ExportPackager {
  constructor(
    private readonly db: Queryable,
    private readonly converter: GeometryConverter,
    private readonly workspaces: WorkspaceManager,
    private readonly options: ExportPackagerOptions
  ) {}

  /**
   * Export the selected rows as a zipped shapefile. The caller owns the
   * returned artifact and must call `release()` once the bytes are delivered.
   */
  async packageQuery(selector: ExportSelector): Promise<ExportArtifact> {
    const selection = buildSelectionQuery(selector, {
      relation: this.options.targetRelation,
      idColumn: this.options.idColumn,
    });
    const fileName = archiveNameFor(selector, this.options.filePrefix);

    if (selector.kind !== 'all') {
      const count = await this.db.query(buildCountQuery(selection).text, selection.values);
      if (Number(count.rows[0]?.matched ?? 0) === 0) {
        throw this.nothingExported(selector);
      }
    }

    const handle = await this.workspaces.acquire('export');
    try {
      const outDir = path.join(handle.dir, 'out');
      await fs.mkdir(outDir);

      let shapefile: string;
      try {
        shapefile = await this.converter.exportFromQuery(selection, outDir);
      } catch (error) {
        if (error instanceof ConversionError && selector.kind !== 'all') {
          throw this.nothingExported(selector, error.stderr);
        }
        throw error;
      }

      if (!(await exists(shapefile))) {
        throw this.nothingExported(selector);
      }

      const archivePath = path.join(handle.dir, fileName);
      const files = await zipDirectory(outDir, archivePath);
      logger.info({ fileName, files }, 'Export archive created');

      return {
        archivePath,
        fileName,
        release: this.releaseOnce(handle),
      };
    } catch (error) {
      await this.workspaces.release(handle);
      throw error;
    }
  }

  private releaseOnce(handle: WorkspaceHandle): () => Promise<void> {
    let released: Promise<void> | undefined;
    return () => {
      if (!released) {
        released = this.workspaces.release(handle);
      }
      return released;
    };
  }

  private nothingExported(selector: ExportSelector, stderr?: string): Error {
    if (selector.kind === 'all') {
      return new ExportFailedError('Failed to create export file');
    }
    return new NotFoundError('Feature not found or export failed', {
      selector,
      ...(stderr ? { stderr } : {}),
    });
  }
}
