/**
 * Greet Handler
 */

import type { OutputSink } from '../io/sink.js';
import type { CommandFunction, CommandSignal } from '../commands/handler.js';

/**
 * `greet` -> "Hello there, stranger!", `greet ann bob` -> "Hello there, ann bob"
 */
export function createGreetHandler(): CommandFunction {
  return async (output: OutputSink, args: readonly string[]): Promise<CommandSignal> => {
    const message = args.length === 0 ? 'Hello there, stranger!' : `Hello there, ${args.join(' ')}`;
    await output.write(`${message}\n`);
    return 'continue';
  };
}
