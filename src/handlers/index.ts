/**
 * Handlers module exports
 * Ready-made commands for composing an interpreter
 */

export { QuitHandler, createQuitHandler } from './quit.js';
export { HelpHandler, createHelpHandler } from './help.js';
export { createGreetHandler } from './greet.js';
export { type TouchHandlerOptions, TouchHandler, createTouchHandler } from './touch.js';
