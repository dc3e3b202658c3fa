import { describe, expect, it } from 'vitest';

import { findBaseDir, formatDisplayPath } from '../../src/lib/display-path.js';

describe('formatDisplayPath', () => {
  it('is relative to the base directory when the file is inside it', () => {
    expect(formatDisplayPath('/photos/2024/trip/beach.jpg', '/photos')).toBe('2024/trip/beach.jpg');
  });

  it('falls back to the file name outside the base directory', () => {
    expect(formatDisplayPath('/screens/shot.png', '/photos')).toBe('shot.png');
    expect(formatDisplayPath('/photos-old/cat.jpg', '/photos')).toBe('cat.jpg');
  });

  it('uses the file name without a base directory', () => {
    expect(formatDisplayPath('/photos/2024/beach.jpg')).toBe('beach.jpg');
  });
});

describe('findBaseDir', () => {
  const directories = ['/photos', '/photos/2024', '/screens'];

  it('returns the first directory containing the file', () => {
    expect(findBaseDir('/photos/2024/beach.jpg', directories)).toBe('/photos');
    expect(findBaseDir('/screens/shot.png', directories)).toBe('/screens');
  });

  it('does not match on a shared name prefix', () => {
    expect(findBaseDir('/photos-old/cat.jpg', directories)).toBeUndefined();
  });
});
