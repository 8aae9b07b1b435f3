/**
 * Services module exports
 */

export {
  type LoopPhase,
  type ErrorContext,
  type ErrorCallback,
  type ErrorHandler,
  type ErrorLogEntry,
  ErrorHandlerImpl,
  createErrorHandler,
  toError,
} from './error-handler.js';
