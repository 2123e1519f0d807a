/**
 * Type exports
 */

export * from './facts.js';
export * from './metrics.js';
