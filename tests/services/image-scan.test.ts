import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { findImages, isSupportedImage } from '../../src/services/image-scan.js';
import { createTempDir, removeTempDir } from '../helpers/test-images.js';

describe('isSupportedImage', () => {
  it('matches extensions case-insensitively', () => {
    expect(isSupportedImage('/photos/cat.JPG')).toBe(true);
    expect(isSupportedImage('/photos/scan.heic')).toBe(true);
    expect(isSupportedImage('/photos/icon.webp')).toBe(true);
  });

  it('rejects other files', () => {
    expect(isSupportedImage('/photos/notes.txt')).toBe(false);
    expect(isSupportedImage('/photos/drawing.bmp')).toBe(false);
    expect(isSupportedImage('/photos/jpg')).toBe(false);
  });
});

describe('findImages', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir('ici-scan-');
    await writeFile(join(dir, 'a.jpg'), 'x');
    await writeFile(join(dir, 'b.PNG'), 'x');
    await writeFile(join(dir, 'notes.txt'), 'x');
    await mkdir(join(dir, 'sub'));
    await writeFile(join(dir, 'sub', 'c.gif'), 'x');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('finds images in subdirectories by default', async () => {
    expect(await findImages(dir)).toEqual([
      join(dir, 'a.jpg'),
      join(dir, 'b.PNG'),
      join(dir, 'sub', 'c.gif')
    ]);
  });

  it('stays in the top directory when not recursive', async () => {
    expect(await findImages(dir, { recursive: false })).toEqual([
      join(dir, 'a.jpg'),
      join(dir, 'b.PNG')
    ]);
  });

  it('rejects a missing directory', async () => {
    const missing = join(dir, 'missing');
    await expect(findImages(missing)).rejects.toThrow(`Directory does not exist: ${missing}`);
  });

  it('rejects a file path', async () => {
    const file = join(dir, 'a.jpg');
    await expect(findImages(file)).rejects.toThrow(`Path is not a directory: ${file}`);
  });
});
