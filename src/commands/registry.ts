/**
 * Command Registry
 * Maps command names to handlers for one interpreter instance
 */

import type { OutputSink } from '../io/sink.js';
import type { Logger } from '../core/logger.js';
import { createSilentLogger } from '../core/logger.js';
import { toCommandHandler, type CommandHandler, type CommandHandlerLike } from './handler.js';

/**
 * Command registry interface
 */
export interface CommandRegistry {
  register(name: string, handler: CommandHandlerLike): Promise<void>;
  lookup(name: string): CommandHandler | undefined;
  has(name: string): boolean;
  getCommandNames(): string[];
}

export interface CommandRegistryOptions {
  logger?: Logger;
}

/**
 * Diagnostic written when a name is registered twice (no trailing newline)
 */
export function duplicateCommandMessage(name: string): string {
  return `Warning: Command with handle ${name} already exists.`;
}

export class CommandRegistryImpl implements CommandRegistry {
  private commands: Map<string, CommandHandler> = new Map();
  private readonly logger: Logger;

  /**
   * @param output - sink that receives duplicate-registration warnings
   */
  constructor(private readonly output: OutputSink, options: CommandRegistryOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Register a handler under a name.
   * A taken name keeps its original handler; the warning goes to the output sink and
   * the returned promise only rejects if that write fails.
   */
  async register(name: string, handler: CommandHandlerLike): Promise<void> {
    if (this.commands.has(name)) {
      this.logger.warn('Duplicate command registration ignored', { command: name });
      await this.output.write(duplicateCommandMessage(name));
      return;
    }

    this.commands.set(name, toCommandHandler(handler));
    this.logger.debug('Command registered', { command: name });
  }

  /**
   * Exact, case-sensitive lookup
   */
  lookup(name: string): CommandHandler | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  /**
   * Registered names in sorted order
   */
  getCommandNames(): string[] {
    return Array.from(this.commands.keys()).sort();
  }
}

/**
 * Factory function to create a new command registry bound to an output sink
 */
export function createCommandRegistry(output: OutputSink, options?: CommandRegistryOptions): CommandRegistry {
  return new CommandRegistryImpl(output, options);
}
