/**
 * Core Module
 *
 * Re-exports all core components.
 */

export * from './types.js';
export * from './backoff.js';
export * from './transform/transformer.js';
export * from './extract/jsonpath.js';
export * from './extract/extractor.js';
export * from './discovery/discovery.js';
