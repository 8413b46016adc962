import JSZip from 'jszip';
import fs from 'fs/promises';
import path from 'path';
import { BadInputError, PayloadTooLargeError } from '../../types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('archive');

export interface ExtractOptions {
  maxBytes: number;
}

const resolveInside = (destDir: string, entryName: string): string | null => {
  const normalized = entryName.replace(/\\/g, '/');
  if (path.posix.isAbsolute(normalized) || /^[a-zA-Z]:/.test(normalized)) {
    return null;
  }

  const root = path.resolve(destDir);
  const resolved = path.resolve(root, normalized);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    return null;
  }
  return resolved;
};

/**
 * Expand a zip archive into `destDir`. Every entry path is validated before
 * anything is written. Returns the extracted file paths relative to `destDir`.
 */
export async function extractArchive(rawBytes: Buffer, destDir: string, options: ExtractOptions): Promise<string[]> {
  if (rawBytes.length > options.maxBytes) {
    throw new PayloadTooLargeError('File too large', {
      size: rawBytes.length,
      maxBytes: options.maxBytes,
    });
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(rawBytes);
  } catch (error) {
    throw new BadInputError(
      `Failed to extract ZIP: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_ARCHIVE'
    );
  }

  const entries: Array<{ target: string; entry: JSZip.JSZipObject }> = [];
  for (const entry of Object.values(zip.files)) {
    const originalName = entry.unsafeOriginalName ?? entry.name;
    const target = resolveInside(destDir, originalName);
    if (target === null) {
      throw new BadInputError('Archive entry escapes the extraction directory', 'INVALID_ARCHIVE', {
        entry: originalName,
      });
    }
    entries.push({ target, entry });
  }

  // Exists even for an archive without entries
  await fs.mkdir(destDir, { recursive: true });

  const extracted: string[] = [];
  for (const { target, entry } of entries) {
    if (entry.dir) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, await entry.async('nodebuffer'));
    extracted.push(path.relative(destDir, target));
  }

  logger.debug({ destDir, files: extracted.length }, 'Archive extracted');
  return extracted;
}
