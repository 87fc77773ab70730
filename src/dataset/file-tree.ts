import { existsSync } from 'fs';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { EncodingError } from '../errors.js';

/** Curated folders flatten directory separators into `>` inside file names. */
const FLATTENED_SEPARATOR = '>';

export function decodeFileName(name: string): string {
  return name.split(FLATTENED_SEPARATOR).join('/');
}

export function encodeFileName(path: string): string {
  return path.split('/').join(FLATTENED_SEPARATOR);
}

/**
 * Decodes file content as UTF-8. A NUL byte marks the file as binary; a
 * leading byte-order mark is dropped.
 */
export function decodeText(path: string, content: Uint8Array): string {
  if (content.includes(0)) throw new EncodingError(path, 'binary content (NUL byte)');
  try {
    // The decoder drops a leading BOM itself.
    return new TextDecoder('utf-8', { fatal: true }).decode(content);
  } catch {
    throw new EncodingError(path, 'not valid UTF-8');
  }
}

/**
 * Reads every file under `root` into memory, keyed by its repository path.
 * Each file is opened, read fully and closed before the next one.
 * A missing directory yields an empty map.
 */
export async function readTree(root: string): Promise<Map<string, Uint8Array>> {
  const files = new Map<string, Uint8Array>();
  if (!existsSync(root)) return files;

  const walk = async (dir: string, prefix: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = join(dir, entry.name);
      const path = prefix + decodeFileName(entry.name);
      if (entry.isDirectory()) await walk(full, `${path}/`);
      else if (entry.isFile()) files.set(path, await readFile(full));
    }
  };

  await walk(root, '');
  return files;
}
