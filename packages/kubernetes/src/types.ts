/**
 * Kubernetes client types
 */

import type { AppliedResource } from '@keelson/shared';

export interface K8sClientConfig {
  /** Kubernetes context to use (default: current context) */
  context?: string;
  /** Kubeconfig path (default: ~/.kube/config or in-cluster) */
  kubeconfig?: string;
  /** Field manager recorded on created and replaced objects */
  fieldManager?: string;
}

export interface NamespaceInfo {
  name: string;
  status: 'Active' | 'Terminating';
  createdAt: Date;
}

export type EnsureNamespaceResult = 'created' | 'exists';

export interface ApplyResourcesResult {
  resources: AppliedResource[];
  durationMs: number;
}

// ============================================
// Argo Rollouts
// ============================================

export const ROLLOUT_API = {
  GROUP: 'argoproj.io',
  VERSION: 'v1alpha1',
  PLURAL: 'rollouts',
} as const;

// ============================================
// Renderer
// ============================================

export interface KustomizeRendererConfig {
  /** Binary to invoke: `kubectl` runs `kubectl kustomize`, `kustomize` runs `kustomize build` */
  binary: string;
  /** Kill the renderer after this many ms */
  timeoutMs: number;
}

export const DEFAULT_RENDERER_CONFIG: KustomizeRendererConfig = {
  binary: 'kubectl',
  timeoutMs: 60000,
};
