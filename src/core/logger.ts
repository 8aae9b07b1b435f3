/**
 * Logger System
 * Level-filtered diagnostics for the interpreter, kept off the command output stream
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  scope?: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(entryLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export type LogOutput = (entry: LogEntry) => void;

/**
 * Renders an entry as a single line:
 * `[2024-01-01T00:00:00.000Z] [WARN] [shell] message {"key":"value"}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const scopeStr = entry.scope ? ` [${entry.scope}]` : '';
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `[${timestamp}] [${entry.level.toUpperCase()}]${scopeStr} ${entry.message}${contextStr}`;
}

/**
 * Default output. Goes to stderr because stdout usually is the interpreter's sink.
 */
export const stderrOutput: LogOutput = (entry: LogEntry) => {
  process.stderr.write(`${formatLogEntry(entry)}\n`);
};

interface LevelState {
  level: LogLevel;
}

export class LoggerImpl implements Logger {
  private readonly state: LevelState;
  private readonly output: LogOutput;
  private readonly scope: string | undefined;

  constructor(level: LogLevel | LevelState = 'info', output: LogOutput = stderrOutput, scope?: string) {
    // Children share the parent's level holder so setLevel applies to the whole tree
    this.state = typeof level === 'string' ? { level } : level;
    this.output = output;
    this.scope = scope;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!shouldLog(level, this.state.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      scope: this.scope,
      context,
    };

    this.output(entry);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorContext: Record<string, unknown> = {
      ...context,
    };

    if (error) {
      errorContext.errorName = error.name;
      errorContext.errorMessage = error.message;
      errorContext.errorStack = error.stack;
    }

    this.log('error', message, Object.keys(errorContext).length > 0 ? errorContext : undefined);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new LoggerImpl(this.state, this.output, nested);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }
}

export function createLogger(level: LogLevel = 'info', output?: LogOutput): Logger {
  return new LoggerImpl(level, output);
}

/**
 * Logger that drops everything, for embedders that want a silent interpreter
 */
export function createSilentLogger(): Logger {
  return new LoggerImpl('error', () => undefined);
}
