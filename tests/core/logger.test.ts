import { describe, it, expect } from 'vitest';
import { logger } from '../../src/core/logger';

describe('Core Logger', () => {
  it('should take its level from LOG_LEVEL', () => {
    expect(logger.level).toBe('silent');
  });

  it('should hand out child loggers with the same level', () => {
    const child = logger.child({ component: 'test' });
    expect(child.level).toBe('silent');
  });

  it('should accept context objects with errors', () => {
    expect(() => logger.error({ error: new Error('boom'), productId: 'A' }, 'Something failed')).not.toThrow();
  });
});
