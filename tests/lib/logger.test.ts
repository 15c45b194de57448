import { describe, it, expect } from 'vitest';
import { componentLogger, logger } from '../../src/lib/logger.js';

describe('Logger', () => {
  it('should create logger instance', () => {
    expect(logger).toBeDefined();
  });

  it('should have standard logging methods', () => {
    expect(logger.info).toBeInstanceOf(Function);
    expect(logger.error).toBeInstanceOf(Function);
    expect(logger.warn).toBeInstanceOf(Function);
    expect(logger.debug).toBeInstanceOf(Function);
  });

  it('should take its level from the environment', () => {
    expect(logger.level).toBe('silent');
  });

  it('should tag every line with the application name', () => {
    expect(logger.bindings()).toMatchObject({ app: 'image-metadata-codec', env: 'test' });
    expect(componentLogger('metadata').bindings()).toMatchObject({
      app: 'image-metadata-codec',
      component: 'metadata'
    });
  });
});
