/**
 * Help Handler
 * Lists the commands registered on an interpreter
 */

import type { OutputSink } from '../io/sink.js';
import type { CommandHandler, CommandSignal } from '../commands/handler.js';
import type { CommandRegistry } from '../commands/registry.js';

export class HelpHandler implements CommandHandler {
  constructor(private readonly registry: Pick<CommandRegistry, 'getCommandNames'>) {}

  async execute(output: OutputSink): Promise<CommandSignal> {
    const names = this.registry.getCommandNames();
    await output.write(`Available commands: ${names.join(' ')}\n`);
    return 'continue';
  }
}

export function createHelpHandler(registry: Pick<CommandRegistry, 'getCommandNames'>): CommandHandler {
  return new HelpHandler(registry);
}
