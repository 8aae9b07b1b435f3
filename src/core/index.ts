/**
 * Core module exports
 * Configuration and logging shared by the interpreter
 */

export {
  type ShellConfig,
  ConfigurationError,
  DEFAULT_PROMPT,
  DEFAULT_LOG_LEVEL,
  loadConfigFromEnv,
  validateConfig,
  defaultConfig,
} from './config.js';

export {
  type LogLevel,
  type LogEntry,
  type Logger,
  type LogOutput,
  LoggerImpl,
  shouldLog,
  formatLogEntry,
  stderrOutput,
  createLogger,
  createSilentLogger,
} from './logger.js';
