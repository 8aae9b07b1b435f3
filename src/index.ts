/**
 * cmdloop
 * Line-oriented command interpreter toolkit
 */

export * from './core/index.js';
export * from './io/index.js';
export * from './commands/index.js';
export * from './handlers/index.js';
export * from './services/index.js';
export * from './shell/index.js';
