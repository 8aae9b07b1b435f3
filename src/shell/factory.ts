/**
 * Interpreter Factory
 * Builds an interpreter from config with logging and error reporting wired in
 */

import { defaultConfig, type ShellConfig } from '../core/config.js';
import { createLogger, type Logger } from '../core/logger.js';
import { createErrorHandler, type ErrorHandler } from '../services/error-handler.js';
import type { InputSource } from '../io/source.js';
import type { OutputSink } from '../io/sink.js';
import { Interpreter } from './interpreter.js';

export interface InterpreterFactoryOptions {
  input: InputSource;
  output: OutputSink;
  /** Custom config (defaults to the built-in prompt and log level) */
  config?: ShellConfig;
  logger?: Logger;
  errorHandler?: ErrorHandler;
}

export function createInterpreter(options: InterpreterFactoryOptions): Interpreter {
  const config = options.config ?? defaultConfig();
  const logger = options.logger ?? createLogger(config.logging.level);
  const errorHandler = options.errorHandler ?? createErrorHandler(logger);

  return new Interpreter({
    input: options.input,
    output: options.output,
    prompt: config.shell.prompt,
    logger,
    errorHandler,
  });
}
