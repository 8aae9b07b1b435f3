/**
 * Quit Handler
 * Ready-made command that ends the interpreter loop
 */

import type { CommandHandler, CommandSignal } from '../commands/handler.js';

/**
 * Always returns 'stop' and writes nothing, whatever the arguments
 */
export class QuitHandler implements CommandHandler {
  execute(): CommandSignal {
    return 'stop';
  }
}

export function createQuitHandler(): CommandHandler {
  return new QuitHandler();
}
