import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

export const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.webp',
  '.gif',
  '.heic',
  '.heif'
]);

export function isSupportedImage(filePath: string): boolean {
  return SUPPORTED_IMAGE_EXTENSIONS.has(extname(filePath).toLowerCase());
}

export interface FindImagesOptions {
  recursive?: boolean;
}

async function collect(directory: string, recursive: boolean, found: string[]): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        await collect(entryPath, recursive, found);
      }
    } else if (entry.isFile() && isSupportedImage(entry.name)) {
      found.push(entryPath);
    }
  }
}

/**
 * Supported images under `directory`, as sorted absolute paths.
 */
export async function findImages(
  directory: string,
  options: FindImagesOptions = {}
): Promise<string[]> {
  const root = resolve(directory);

  let rootStats: Stats;
  try {
    rootStats = await stat(root);
  } catch {
    throw new Error(`Directory does not exist: ${directory}`);
  }
  if (!rootStats.isDirectory()) {
    throw new Error(`Path is not a directory: ${directory}`);
  }

  const found: string[] = [];
  await collect(root, options.recursive ?? true, found);
  return found.sort();
}
