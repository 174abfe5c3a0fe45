/**
 * Type exports
 */

export * from './execution.js';
