/**
 * Shared types: single source of truth for graph, query and error types.
 */

export * from './knowledge-graph';
export * from './query';
export * from './errors';
