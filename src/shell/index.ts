/**
 * Shell module exports
 * The dispatch loop and its factory
 */

export {
  type InterpreterOptions,
  Interpreter,
  InterpreterBusyError,
  unknownCommandMessage,
} from './interpreter.js';

export { type InterpreterFactoryOptions, createInterpreter } from './factory.js';
