/**
 * @boardscout/core — error taxonomy, logging, backoff and text helpers
 */

export * from './errors';
export * from './logger';
export * from './backoff';
export * from './text';
