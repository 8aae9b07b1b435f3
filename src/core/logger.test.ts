/**
 * Property-based tests for Logger System
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  type LogLevel,
  type LogEntry,
  LoggerImpl,
  shouldLog,
  createLogger,
  createSilentLogger,
  formatLogEntry,
} from './logger.js';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const logLevelArbitrary = fc.constantFrom<LogLevel>(...LOG_LEVELS);

const logMessageArbitrary = fc.string({ minLength: 1, maxLength: 200 });

const logContextArbitrary = fc.option(
  fc.dictionary(
    fc.string({ minLength: 1, maxLength: 20 }),
    fc.oneof(fc.string(), fc.integer(), fc.boolean())
  ),
  { nil: undefined }
);

describe('Logger System Property Tests', () => {
  describe('Log Level Filtering', () => {
    it('should output entries with level >= configured level', () => {
      fc.assert(
        fc.property(logLevelArbitrary, logLevelArbitrary, (configuredLevel, entryLevel) => {
          const expected = LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
          expect(shouldLog(entryLevel, configuredLevel)).toBe(expected);
        }),
        { numRuns: 100 }
      );
    });

    it('should filter log entries correctly through logger instance', () => {
      fc.assert(
        fc.property(
          logLevelArbitrary,
          logMessageArbitrary,
          logContextArbitrary,
          (configuredLevel, message, context) => {
            const loggedEntries: LogEntry[] = [];
            const logger = createLogger(configuredLevel, (entry) => loggedEntries.push(entry));

            logger.debug(message, context);
            logger.info(message, context);
            logger.warn(message, context);
            logger.error(message, undefined, context);

            const expectedCount = LOG_LEVELS.filter(
              level => LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLevel]
            ).length;
            expect(loggedEntries.length).toBe(expectedCount);
            for (const entry of loggedEntries) {
              expect(entry.message).toBe(message);
            }
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Scoped Loggers', () => {
    it('should tag child entries with a nested scope', () => {
      const loggedEntries: LogEntry[] = [];
      const logger = new LoggerImpl('debug', (entry) => loggedEntries.push(entry), 'shell');

      logger.child('registry').info('registered');

      expect(loggedEntries).toHaveLength(1);
      expect(loggedEntries[0].scope).toBe('shell:registry');
    });

    it('should apply setLevel on the parent to existing children', () => {
      fc.assert(
        fc.property(logLevelArbitrary, logLevelArbitrary, (initialLevel, newLevel) => {
          const loggedEntries: LogEntry[] = [];
          const parent = createLogger(initialLevel, (entry) => loggedEntries.push(entry));
          const child = parent.child('loop');

          parent.setLevel(newLevel);
          expect(child.getLevel()).toBe(newLevel);

          child.debug('a');
          child.info('b');
          child.warn('c');
          child.error('d');

          for (const entry of loggedEntries) {
            expect(LOG_LEVEL_PRIORITY[entry.level]).toBeGreaterThanOrEqual(LOG_LEVEL_PRIORITY[newLevel]);
          }
        }),
        { numRuns: 50 }
      );
    });
  });

  describe('Error Entries', () => {
    it('should attach error name and message to the context', () => {
      const loggedEntries: LogEntry[] = [];
      const logger = createLogger('error', (entry) => loggedEntries.push(entry));
      const error = new TypeError('bad sink');

      logger.error('write failed', error, { phase: 'prompt' });

      expect(loggedEntries).toHaveLength(1);
      expect(loggedEntries[0].context?.phase).toBe('prompt');
      expect(loggedEntries[0].context?.errorName).toBe('TypeError');
      expect(loggedEntries[0].context?.errorMessage).toBe('bad sink');
    });

    it('should leave context undefined when there is nothing to attach', () => {
      const loggedEntries: LogEntry[] = [];
      const logger = createLogger('error', (entry) => loggedEntries.push(entry));

      logger.error('plain');

      expect(loggedEntries[0].context).toBeUndefined();
    });
  });

  describe('Formatting', () => {
    it('should render timestamp, level, scope and context on one line', () => {
      const line = formatLogEntry({
        level: 'warn',
        message: 'No command bogus',
        timestamp: new Date('2024-01-01T00:00:00.000Z'),
        scope: 'shell',
        context: { command: 'bogus' },
      });

      expect(line).toBe('[2024-01-01T00:00:00.000Z] [WARN] [shell] No command bogus {"command":"bogus"}');
    });

    it('should omit scope and context when absent', () => {
      const line = formatLogEntry({
        level: 'info',
        message: 'ready',
        timestamp: new Date('2024-01-01T00:00:00.000Z'),
      });

      expect(line).toBe('[2024-01-01T00:00:00.000Z] [INFO] ready');
    });
  });

  it('silent logger should never emit', () => {
    const logger = createSilentLogger();
    expect(() => logger.error('ignored', new Error('x'))).not.toThrow();
    expect(logger.getLevel()).toBe('error');
  });
});
