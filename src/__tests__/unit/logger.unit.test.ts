/**
 * Unit Tests — Logger
 */
import { logger } from '@core/logger';

describe('logger', () => {
  it('should tag every line with the app name', () => {
    expect(logger.bindings()).toEqual({ app: 'food-truck-orm' });
  });

  it('should honour the level set for tests', () => {
    expect(logger.level).toBe('silent');
  });
});
