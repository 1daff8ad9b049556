/**
 * Source File Service
 *
 * Reads source files (plain or gzip-compressed) and writes outputs in a
 * single call, so a failed run never leaves a partial file behind.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { gunzipSync } from 'node:zlib';

const GZIP_MAGIC = [0x1f, 0x8b];

/**
 * Whether a buffer starts with the gzip magic bytes.
 */
export function isGzip(buffer: Uint8Array): boolean {
  return buffer.length >= 2 && buffer[0] === GZIP_MAGIC[0] && buffer[1] === GZIP_MAGIC[1];
}

/**
 * Source File Service
 */
export class SourceFileService {
  /**
   * Reads a text file, decompressing gzip content.
   */
  async readText(path: string): Promise<string> {
    const buffer = await readFile(path);
    const raw = isGzip(buffer) ? gunzipSync(buffer) : buffer;
    return raw.toString('utf-8');
  }

  /**
   * Writes content to a sibling temporary file, then renames it into place.
   */
  async writeText(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const temporary = `${path}.${process.pid}.tmp`;
    await writeFile(temporary, content, 'utf-8');
    await rename(temporary, path);
  }
}

// Export singleton instance for convenience
export const sourceFiles = new SourceFileService();
