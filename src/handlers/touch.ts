/**
 * Touch Handler
 * Creates (or truncates) the file named by the first argument
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import type { OutputSink } from '../io/sink.js';
import type { CommandHandler, CommandSignal } from '../commands/handler.js';
import type { Logger } from '../core/logger.js';
import { createSilentLogger } from '../core/logger.js';

export interface TouchHandlerOptions {
  /** Directory relative file names resolve against (defaults to process.cwd()) */
  baseDir?: string;
  logger?: Logger;
}

export class TouchHandler implements CommandHandler {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(options: TouchHandlerOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.logger = options.logger ?? createSilentLogger();
  }

  async execute(output: OutputSink, args: readonly string[]): Promise<CommandSignal> {
    if (args.length === 0) {
      await output.write('Need to specify a filename\n');
      return 'continue';
    }

    const filename = args[0];
    const target = path.resolve(this.baseDir, filename);
    try {
      await writeFile(target, '');
    } catch (error) {
      // A filesystem failure is the command's result, not an interpreter I/O failure
      this.logger.warn('touch failed', {
        file: target,
        reason: error instanceof Error ? error.message : String(error),
      });
      await output.write(`Could not create file: ${filename}\n`);
      return 'continue';
    }

    await output.write(`Created file: ${filename}\n`);
    return 'continue';
  }
}

export function createTouchHandler(options?: TouchHandlerOptions): CommandHandler {
  return new TouchHandler(options);
}
