/**
 * Command Handler
 * The capability every registered command implements
 */

import type { OutputSink } from '../io/sink.js';

/**
 * Loop control returned by a handler. 'stop' is the only way a handler ends the loop.
 */
export type CommandSignal = 'continue' | 'stop';

export type CommandResult = CommandSignal | Promise<CommandSignal>;

/**
 * A command. Any state it needs lives on the instance; writes that fail must reject,
 * never be swallowed, so the interpreter can halt with the original error.
 */
export interface CommandHandler {
  execute(output: OutputSink, args: readonly string[]): CommandResult;
}

/**
 * Plain function form of a handler, for registering closures
 */
export type CommandFunction = (output: OutputSink, args: readonly string[]) => CommandResult;

export type CommandHandlerLike = CommandHandler | CommandFunction;

export function toCommandHandler(handler: CommandHandlerLike): CommandHandler {
  if (typeof handler === 'function') {
    return { execute: (output, args) => handler(output, args) };
  }
  return handler;
}
