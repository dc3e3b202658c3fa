import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { main, parseCliArgs } from '../src/cli.js';
import { createTempDir, removeTempDir } from './helpers/test-images.js';

describe('parseCliArgs', () => {
  it('defaults to a recursive write in normal mode', () => {
    expect(parseCliArgs(['~/Pictures'])).toEqual({
      directories: ['~/Pictures'],
      recursive: true,
      mode: 'normal',
      dryRun: false,
      verifyOnly: false,
      force: false
    });
  });

  it('reads every flag', () => {
    expect(
      parseCliArgs(['a', 'b', '--no-recursive', '--dry-run', '--verify', '--force', '--screenshot'])
    ).toEqual({
      directories: ['a', 'b'],
      recursive: false,
      mode: 'screenshot',
      dryRun: true,
      verifyOnly: true,
      force: true
    });
  });

  it('requires a directory', () => {
    expect(() => parseCliArgs(['--dry-run'])).toThrow('At least one directory is required');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['photos', '--overwrite'])).toThrow();
  });
});

describe('main', () => {
  it('fails without arguments', async () => {
    expect(await main([])).toBe(1);
  });

  it('fails for a missing directory', async () => {
    expect(await main(['/nonexistent/image-content-indexer'])).toBe(1);
  });

  it('fails when a directory has no images', async () => {
    const dir = await createTempDir('ici-cli-');
    try {
      expect(await main([join(dir, '.')])).toBe(1);
    } finally {
      await removeTempDir(dir);
    }
  });
});
