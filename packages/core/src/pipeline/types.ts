/**
 * Deploy pipeline types
 */

import type {
  DeployInputs,
  DeployOutputs,
  DeploymentTarget,
  KeelsonError,
  Logger,
} from '@keelson/shared';
import type { RolloutTransition } from '../delivery/index.js';
import type { Clock, ClusterClient, GitOpsPublisher, OverlayRenderer } from '../types.js';

export const PIPELINE_PHASES = {
  IDLE: 'idle',
  RESOLVING: 'resolving',
  MUTATING: 'mutating',
  INSPECTING: 'inspecting',
  SELECTING: 'selecting',
  PROVISIONING: 'provisioning',
  COMMITTING: 'committing',
  APPLYING: 'applying',
  WAITING: 'waiting',
  COMPLETE: 'complete',
  FAILED: 'failed',
} as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[keyof typeof PIPELINE_PHASES];

export type DeployRequest = DeployInputs;

export interface DeployPipelineDeps {
  renderer: OverlayRenderer;
  cluster: ClusterClient;
  publisher: GitOpsPublisher;
  clock?: Clock;
  logger?: Logger;
}

export interface DeployPipelineConfig {
  annotationPrefix: string;
  defaultNamespace: string;
  pollIntervalMs: number;
}

export interface PipelineEvents {
  phase: (event: { runId: string; from: PipelinePhase; to: PipelinePhase }) => void;
  target: (event: { runId: string; target: DeploymentTarget }) => void;
  'rollout:transition': (event: { runId: string; transition: RolloutTransition }) => void;
  complete: (event: { runId: string; outputs: DeployOutputs; durationMs: number }) => void;
  failed: (event: { runId: string; phase: PipelinePhase; error: KeelsonError }) => void;
}
