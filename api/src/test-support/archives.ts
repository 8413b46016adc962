import JSZip from 'jszip';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Row } from '../types';

/**
 * Zip holding a minimal shapefile set whose `.json` sidecar describes the
 * layer for the fake converter.
 */
export async function shapefileArchive(
  layer: { columns: string[]; rows: Row[] },
  name: string = 'parcels'
): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(`${name}.shp`, 'shp');
  zip.file(`${name}.shx`, 'shx');
  zip.file(`${name}.dbf`, 'dbf');
  zip.file(`${name}.prj`, 'GEOGCS["WGS 84"]');
  zip.file(`${name}.json`, JSON.stringify(layer));
  return zip.generateAsync({ type: 'nodebuffer' });
}

export async function makeTempRoot(label: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${label}-`));
}
