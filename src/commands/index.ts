/**
 * Commands module exports
 * Tokenizer, handler capability and the name-to-handler registry
 */

export { type CommandInvocation, tokenize } from './tokenizer.js';

export {
  type CommandSignal,
  type CommandResult,
  type CommandHandler,
  type CommandFunction,
  type CommandHandlerLike,
  toCommandHandler,
} from './handler.js';

export {
  type CommandRegistry,
  type CommandRegistryOptions,
  CommandRegistryImpl,
  createCommandRegistry,
  duplicateCommandMessage,
} from './registry.js';
