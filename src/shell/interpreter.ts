/**
 * Interpreter
 * The read-parse-dispatch loop driving a command registry over an input source and output sink
 */

import type { InputSource } from '../io/source.js';
import type { OutputSink } from '../io/sink.js';
import type { Logger } from '../core/logger.js';
import { createSilentLogger } from '../core/logger.js';
import { DEFAULT_PROMPT } from '../core/config.js';
import { tokenize } from '../commands/tokenizer.js';
import type { CommandHandlerLike, CommandSignal } from '../commands/handler.js';
import { createCommandRegistry, type CommandRegistry } from '../commands/registry.js';
import { toError, type ErrorHandler, type LoopPhase } from '../services/error-handler.js';

export interface InterpreterOptions {
  input: InputSource;
  output: OutputSink;
  /** Registry to dispatch against; must write its warnings to the same output */
  registry?: CommandRegistry;
  prompt?: string;
  logger?: Logger;
  errorHandler?: ErrorHandler;
}

/**
 * Thrown when run() is called on an interpreter whose loop is already running
 */
export class InterpreterBusyError extends Error {
  constructor() {
    super('Interpreter is already running');
    this.name = 'InterpreterBusyError';
  }
}

export function unknownCommandMessage(command: string): string {
  return `No command ${command}\n`;
}

/**
 * Tracks where the current iteration is, so a fatal error can be reported with its phase
 */
interface IterationState {
  phase: LoopPhase;
  command?: string;
}

export class Interpreter {
  private readonly input: InputSource;
  private readonly output: OutputSink;
  private readonly registry: CommandRegistry;
  private readonly prompt: string;
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler | undefined;
  private running = false;

  constructor(options: InterpreterOptions) {
    this.input = options.input;
    this.output = options.output;
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
    this.logger = (options.logger ?? createSilentLogger()).child('shell');
    this.registry = options.registry ?? createCommandRegistry(this.output, { logger: this.logger.child('registry') });
    this.errorHandler = options.errorHandler;
  }

  /**
   * Register a command. A taken name keeps its first handler and a warning is written.
   */
  async register(name: string, handler: CommandHandlerLike): Promise<void> {
    try {
      await this.registry.register(name, handler);
    } catch (error) {
      throw this.report(error, { phase: 'register', command: name });
    }
  }

  getRegistry(): CommandRegistry {
    return this.registry;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run until a handler returns 'stop' or the input is exhausted.
   * Rejects with the original error on the first failed read, write or flush.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new InterpreterBusyError();
    }

    this.running = true;
    this.logger.debug('Interpreter started', { commands: this.registry.getCommandNames() });

    const state: IterationState = { phase: 'prompt' };
    try {
      let signal: CommandSignal = 'continue';
      while (signal === 'continue') {
        signal = await this.iterate(state);
      }
    } catch (error) {
      throw this.report(error, state);
    } finally {
      this.running = false;
    }
  }

  private async iterate(state: IterationState): Promise<CommandSignal> {
    state.phase = 'prompt';
    state.command = undefined;
    await this.output.write(this.prompt);
    await this.output.flush();

    state.phase = 'read';
    const line = await this.input.readLine();
    if (line === null) {
      // End of input counts as an implicit stop
      this.logger.debug('End of input, stopping');
      return 'stop';
    }

    const { command, args } = tokenize(line);
    if (command === '') {
      return 'continue';
    }
    state.command = command;

    const handler = this.registry.lookup(command);
    if (!handler) {
      state.phase = 'diagnostic';
      this.logger.debug('Unknown command', { command });
      await this.output.write(unknownCommandMessage(command));
      return 'continue';
    }

    state.phase = 'dispatch';
    this.logger.debug('Dispatching command', { command, argc: args.length });
    const signal = await handler.execute(this.output, args);
    if (signal === 'stop') {
      this.logger.debug('Command requested stop', { command });
    }
    return signal;
  }

  /**
   * Hands the failure to the error handler and returns it for rethrowing as-is
   */
  private report(error: unknown, state: IterationState): unknown {
    if (this.errorHandler) {
      this.errorHandler.handle(toError(error), { phase: state.phase, command: state.command });
    }
    return error;
  }
}
