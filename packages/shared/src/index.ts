/**
 * @description Public exports for utilities shared across workspace packages.
 * @scope interface
 * @module SharedIndex
 * @risk: low - Export changes can break downstream imports.
 */

/**
 * Logging utilities.
 */
export { logger, sanitizeLogData, describeError } from './logger.js';
