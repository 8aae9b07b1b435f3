#!/usr/bin/env node
/**
 * cmdloop
 * Example interpreter over stdin/stdout with help, greet, touch and quit
 * Settings come from CMD_PROMPT and LOG_LEVEL (or a .env file)
 */

import { loadConfigFromEnv } from './core/config.js';
import { createLogger } from './core/logger.js';
import { createErrorHandler } from './services/error-handler.js';
import { createStreamSink } from './io/sink.js';
import { createStreamSource } from './io/source.js';
import { createInterpreter } from './shell/factory.js';
import {
  createGreetHandler,
  createHelpHandler,
  createQuitHandler,
  createTouchHandler,
} from './handlers/index.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const logger = createLogger(config.logging.level);
  const errorHandler = createErrorHandler(logger);

  const interpreter = createInterpreter({
    input: createStreamSource(process.stdin),
    output: createStreamSink(process.stdout),
    config,
    logger,
    errorHandler,
  });

  try {
    await interpreter.register('help', createHelpHandler(interpreter.getRegistry()));
    await interpreter.register('greet', createGreetHandler());
    await interpreter.register('touch', createTouchHandler({ logger: logger.child('touch') }));
    await interpreter.register('quit', createQuitHandler());

    await interpreter.run();
  } catch (error) {
    // Interpreter failures are already logged with their loop phase
    if (!errorHandler.wasReported(error)) {
      throw error;
    }
    process.exitCode = 1;
  }

  // stdin may still hold the event loop open after a quit
  process.stdin.pause();
}

main().catch((error: unknown) => {
  console.error('cmdloop failed:', error);
  process.exitCode = 1;
});
