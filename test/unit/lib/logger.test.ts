/**
 * Tests for logger utilities
 */

import { describe, it, expect, jest } from '@jest/globals';
import { appConfig } from '../../../src/config/app-config';
import { createLogger, createTimer } from '../../../src/lib/logger';

describe('logger', () => {
  describe('createLogger', () => {
    it('uses the configured level by default', () => {
      expect(createLogger().level).toBe(appConfig.logging.level);
    });

    it('lets explicit options win', () => {
      expect(createLogger({ level: 'error' }).level).toBe('error');
    });
  });

  describe('createTimer', () => {
    it('logs completion with the duration', () => {
      const logger = createLogger({ level: 'silent' });
      const info = jest.spyOn(logger, 'info').mockImplementation(() => undefined);

      const timer = createTimer(logger, 'recommend', { language: 'python' });
      const duration = timer.end({ candidates: 2 });

      expect(duration).toBeGreaterThanOrEqual(0);
      expect(info).toHaveBeenCalledWith(
        { operation: 'recommend', duration_ms: duration, language: 'python', candidates: 2 },
        `Completed recommend in ${duration}ms`,
      );
    });

    it('logs checkpoints at debug level with the elapsed time', () => {
      const logger = createLogger({ level: 'silent' });
      const debug = jest.spyOn(logger, 'debug').mockImplementation(() => undefined);

      const elapsed = createTimer(logger, 'recommend').checkpoint('candidates filtered', { queried: 3 });

      expect(debug).toHaveBeenLastCalledWith(
        { operation: 'recommend', checkpoint: 'candidates filtered', elapsed_ms: elapsed, queried: 3 },
        `recommend checkpoint: candidates filtered at ${elapsed}ms`,
      );
    });

    it('logs failures with the error message', () => {
      const logger = createLogger({ level: 'silent' });
      const error = jest.spyOn(logger, 'error').mockImplementation(() => undefined);

      createTimer(logger, 'recommend').error(new Error('catalog unavailable'));

      expect(error).toHaveBeenCalledWith(
        expect.objectContaining({ operation: 'recommend', error: 'catalog unavailable' }),
        expect.stringMatching(/^Failed recommend after \d+ms$/),
      );
    });
  });
});
