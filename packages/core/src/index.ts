/**
 * @keelson/core
 * Deploy pipeline for kustomize overlays
 */

// Boundaries
export * from './types.js';

// Pipeline
export * from './pipeline/index.js';

// Phases
export * from './resolver/index.js';
export * from './mutator/index.js';
export * from './inspector/index.js';
export * from './delivery/index.js';
