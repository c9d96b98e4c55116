/**
 * Core types for Keelson
 */

// Delivery modes
export const DEPLOY_MODES = {
  GITOPS: 'gitops',
  KUBECTL: 'kubectl',
} as const;

export type DeployMode = (typeof DEPLOY_MODES)[keyof typeof DEPLOY_MODES];

/**
 * Mode requested by the caller; 'auto' never survives mode selection
 */
export type ForceMode = DeployMode | 'auto';

// Rollout wait states
export const ROLLOUT_STATES = {
  PENDING: 'Pending',
  PROGRESSING: 'Progressing',
  SUCCEEDED: 'Succeeded',
  FAILED: 'Failed',
  TIMED_OUT: 'TimedOut',
} as const;

export type RolloutState = (typeof ROLLOUT_STATES)[keyof typeof ROLLOUT_STATES];

/**
 * States reported by a single status read. TimedOut is decided by the waiter.
 */
export type ObservedRolloutState = Exclude<RolloutState, 'TimedOut'>;

export const WORKLOAD_KINDS = ['Deployment', 'Rollout'] as const;

export type WorkloadKind = (typeof WORKLOAD_KINDS)[number];

export function isWorkloadKind(kind: string): kind is WorkloadKind {
  return (WORKLOAD_KINDS as readonly string[]).includes(kind);
}

// Well-known labels
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const VERSION_LABEL = 'app.kubernetes.io/version';
export const GITOPS_MANAGER = 'argocd';

// ===========================================
// Images and environment patches
// ===========================================

export interface ImageRef {
  /** Full repository path without a tag */
  name: string;
  newTag: string;
}

/**
 * Resolved image input. The first entry is the primary image.
 */
export interface ImageSpec {
  source: 'single' | 'list';
  images: [ImageRef, ...ImageRef[]];
}

/**
 * Target selector -> variable name -> value
 */
export type EnvPatchSet = Record<string, Record<string, string>>;

/**
 * Run metadata stamped onto the overlay
 */
export interface RunContext {
  actor: string;
  runId: string;
  environment: string;
  serviceName: string;
  /** Wall-clock time the run started mutating */
  timestamp: Date;
}

// ===========================================
// Rendered resources
// ===========================================

export interface ResourceMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  [key: string]: unknown;
}

/**
 * One document produced by the overlay renderer
 */
export interface ResourceDoc {
  apiVersion: string;
  kind: string;
  metadata: ResourceMetadata;
  [key: string]: unknown;
}

export interface RenderedWorkload {
  kind: WorkloadKind;
  name: string;
  namespace: string;
  labels: Record<string, string>;
}

export interface DeploymentTarget {
  namespace: string;
  primaryWorkloadName: string;
  primaryWorkloadKind: WorkloadKind;
  managedBy?: string;
  workloads: RenderedWorkload[];
}

// ===========================================
// Workload status
// ===========================================

export interface WorkloadStatus {
  kind: WorkloadKind;
  name: string;
  namespace: string;
  state: ObservedRolloutState;
  desiredReplicas: number;
  updatedReplicas: number;
  readyReplicas: number;
  availableReplicas: number;
  /** Rollout phase (Healthy, Progressing, Paused, Degraded) for Rollout kinds */
  phase?: string;
  message: string;
  reason?: string;
}

// ===========================================
// Delivery results
// ===========================================

export interface AppliedResource {
  kind: string;
  name: string;
  namespace?: string;
  action: 'created' | 'configured';
}

export type CommitResult =
  | { status: 'committed'; commit: string; branch: string; files: string[] }
  | { status: 'no-changes'; branch: string };

// ===========================================
// Outputs
// ===========================================

export interface DeployOutputs {
  mode: DeployMode;
  namespace: string;
  deployment: string;
  /** Empty string when the primary workload carries no managed-by label */
  managedBy: string;
  dryRun: boolean;
  /** GitOps runs: false when the overlay was already up to date */
  changed?: boolean;
  /** GitOps runs: commit hash of the pushed change */
  commit?: string;
}
