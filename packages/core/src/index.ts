/**
 * @clientkey/core
 *
 * Shared ambient stack: configuration loader, error classes, logger.
 */

// Configuration
export * from './config/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
