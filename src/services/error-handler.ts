/**
 * Error Handler
 * Records fatal interpreter errors with the loop phase they happened in
 */

import { type Logger, createLogger } from '../core/logger.js';

/**
 * Where in the read-dispatch cycle an error surfaced
 */
export type LoopPhase = 'register' | 'prompt' | 'read' | 'dispatch' | 'diagnostic';

export interface ErrorContext {
  phase: LoopPhase;
  command?: string;
}

export type ErrorCallback = (error: Error, ctx: ErrorContext) => void;

export interface ErrorHandler {
  handle(error: Error, ctx: ErrorContext): void;
  onError(callback: ErrorCallback): void;
  wasReported(error: unknown): boolean;
  getLastLoggedError(): ErrorLogEntry | null;
}

export interface ErrorLogEntry {
  errorName: string;
  errorMessage: string;
  stackTrace: string | undefined;
  phase: LoopPhase;
  command: string | undefined;
  timestamp: Date;
}

/**
 * Normalizes anything thrown into an Error, keeping Error instances as they are
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class ErrorHandlerImpl implements ErrorHandler {
  private logger: Logger;
  private callbacks: ErrorCallback[] = [];
  private lastLoggedError: ErrorLogEntry | null = null;
  private reported = new WeakSet<Error>();

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('error');
  }

  /**
   * Log an error with its loop context and notify callbacks.
   * Reporting only; the caller still rethrows.
   */
  handle(error: Error, ctx: ErrorContext): void {
    this.reported.add(error);
    this.lastLoggedError = {
      errorName: error.name,
      errorMessage: error.message,
      stackTrace: error.stack,
      phase: ctx.phase,
      command: ctx.command,
      timestamp: new Date(),
    };

    this.logger.error('Interpreter halted by I/O error', error, {
      phase: ctx.phase,
      ...(ctx.command !== undefined ? { command: ctx.command } : {}),
    });

    for (const callback of this.callbacks) {
      try {
        callback(error, ctx);
      } catch (callbackError) {
        // A failing callback must not replace the original error
        this.logger.warn('Error callback threw an exception', {
          callbackError: toError(callbackError).message,
        });
      }
    }
  }

  onError(callback: ErrorCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Whether this exact error object has already been logged here
   */
  wasReported(error: unknown): boolean {
    return error instanceof Error && this.reported.has(error);
  }

  /**
   * Get the last logged error entry
   */
  getLastLoggedError(): ErrorLogEntry | null {
    return this.lastLoggedError;
  }
}

export function createErrorHandler(logger?: Logger): ErrorHandler {
  return new ErrorHandlerImpl(logger);
}
