/**
 * Type exports
 */

export * from './analysis.js';
