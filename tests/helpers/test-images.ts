/**
 * Test Image Generator
 *
 * Writes small synthetic images into a temp directory for the writer,
 * scanner and analyzer tests.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import sharp from 'sharp';

export interface TestImageOptions {
  width?: number;
  height?: number;
  format?: 'jpeg' | 'png';
  alpha?: boolean;
  color?: { r: number; g: number; b: number };
}

/**
 * Create a solid-color test image
 */
export async function createTestImage(options: TestImageOptions = {}): Promise<Buffer> {
  const {
    width = 64,
    height = 48,
    format = 'jpeg',
    alpha = false,
    color = { r: 120, g: 180, b: 220 }
  } = options;

  const pipeline = sharp({
    create: {
      width,
      height,
      channels: alpha ? 4 : 3,
      background: alpha ? { ...color, alpha: 0.5 } : color
    }
  });

  return format === 'png' ? pipeline.png().toBuffer() : pipeline.jpeg({ quality: 90 }).toBuffer();
}

export async function writeTestImage(
  directory: string,
  name: string,
  options: TestImageOptions = {}
): Promise<string> {
  const filePath = join(directory, name);
  await writeFile(filePath, await createTestImage(options));
  return filePath;
}

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}
