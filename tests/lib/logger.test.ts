import { describe, it, expect } from 'vitest';
import { logger } from '../../src/lib/logger.js';

describe('Logger', () => {
  it('should use the configured level', () => {
    expect(logger.level).toBe('silent');
  });

  it('should have standard logging methods', () => {
    expect(logger.info).toBeInstanceOf(Function);
    expect(logger.error).toBeInstanceOf(Function);
    expect(logger.warn).toBeInstanceOf(Function);
    expect(logger.debug).toBeInstanceOf(Function);
  });

  it('should tag child loggers with their bindings', () => {
    const child = logger.child({ file: 'beach.jpg' });
    expect(child.bindings()).toMatchObject({ app: 'image-content-indexer', file: 'beach.jpg' });
  });
});
