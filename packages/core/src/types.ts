/**
 * Boundaries of the deploy pipeline.
 * The renderer, cluster and git implementations live in their own packages;
 * the pipeline only sees these interfaces.
 */

import type {
  AppliedResource,
  CommitResult,
  ResourceDoc,
  WorkloadKind,
  WorkloadStatus,
} from '@keelson/shared';

export interface OverlayRenderer {
  /** Render an overlay directory into resource documents */
  render(overlayDir: string): Promise<ResourceDoc[]>;
}

export interface ClusterClient {
  namespaceExists(name: string): Promise<boolean>;
  /** Resolves 'exists' when another writer created it first */
  createNamespace(name: string): Promise<'created' | 'exists'>;
  /**
   * Apply documents in order. Rejects on the first failure; earlier
   * documents stay applied.
   */
  applyResources(docs: ResourceDoc[], namespace: string): Promise<{ resources: AppliedResource[] }>;
  getWorkloadStatus(kind: WorkloadKind, name: string, namespace: string): Promise<WorkloadStatus>;
}

export interface GitOpsPublisher {
  /** Commit exactly `files` (absolute paths) and push them */
  commitAndPush(files: string[], message: string): Promise<CommitResult>;
}

/**
 * Time source for the rollout wait loop
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
