/**
 * @keelson/kubernetes
 * Kubernetes client, overlay renderer and workload status evaluation
 */

export { K8sClient, type K8sApis, type K8sClientOptions } from './k8s-client.js';
export { KustomizeRenderer, parseRenderedDocuments } from './kustomize-renderer.js';
export {
  evaluateDeploymentStatus,
  evaluateRolloutStatus,
  rolloutObjectSchema,
  type RolloutObject,
} from './workload-status.js';
export * from './types.js';
