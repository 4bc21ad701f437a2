/**
 * Shared ambient stack: logging, configuration and the error taxonomy
 */

export * from './logger.js';
export * from './config.js';
export * from './errors.js';
