/**
 * Config System
 * Loads and validates interpreter configuration from environment variables
 */

import 'dotenv/config';
import type { LogLevel } from './logger.js';

export interface ShellConfig {
  shell: {
    prompt: string;
  };
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_PROMPT = '(cmd) ';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isValidLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Validates a raw config object against the ShellConfig schema
 * Throws ConfigurationError if validation fails
 */
export function validateConfig(config: unknown): config is ShellConfig {
  if (!isRecord(config)) {
    throw new ConfigurationError('Config must be an object');
  }

  const shell = config.shell;
  if (!isRecord(shell)) {
    throw new ConfigurationError('Missing required config section: shell');
  }
  if (typeof shell.prompt !== 'string' || shell.prompt === '') {
    throw new ConfigurationError('Missing required config: shell.prompt must be a non-empty string');
  }

  const logging = config.logging;
  if (!isRecord(logging)) {
    throw new ConfigurationError('Missing required config section: logging');
  }
  if (typeof logging.level !== 'string' || !isValidLogLevel(logging.level)) {
    throw new ConfigurationError(
      `Invalid config: logging.level must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return true;
}

/**
 * Loads configuration from environment variables.
 * CMD_PROMPT is taken verbatim (trailing spaces matter); an empty value means the default.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): ShellConfig {
  const prompt = env.CMD_PROMPT || DEFAULT_PROMPT;

  const logLevel = env.LOG_LEVEL?.trim() || DEFAULT_LOG_LEVEL;
  if (!isValidLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return {
    shell: {
      prompt,
    },
    logging: {
      level: logLevel,
    },
  };
}

export function defaultConfig(): ShellConfig {
  return loadConfigFromEnv({});
}
