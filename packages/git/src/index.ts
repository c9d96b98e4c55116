/**
 * @keelson/git
 * Commits and pushes overlay changes for GitOps deliveries
 */

export * from './types.js';
export * from './client/index.js';
export * from './gitops-committer.js';
