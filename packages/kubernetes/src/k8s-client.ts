/**
 * Kubernetes Client
 * Namespace provisioning, resource apply and workload status reads
 */

import * as k8s from '@kubernetes/client-node';
import {
  createChildLogger,
  isRecord,
  logResourceApplied,
  KubectlError,
  type AppliedResource,
  type ResourceDoc,
  type WorkloadKind,
  type WorkloadStatus,
} from '@keelson/shared';
import type { ApplyResourcesResult, EnsureNamespaceResult, K8sClientConfig, NamespaceInfo } from './types.js';
import { ROLLOUT_API } from './types.js';
import { evaluateDeploymentStatus, evaluateRolloutStatus, rolloutObjectSchema } from './workload-status.js';

const DEFAULT_FIELD_MANAGER = 'keelson';

// Kinds that live outside any namespace; everything else is applied namespaced
const CLUSTER_SCOPED_KINDS = new Set([
  'Namespace',
  'ClusterRole',
  'ClusterRoleBinding',
  'CustomResourceDefinition',
  'PersistentVolume',
  'StorageClass',
  'PriorityClass',
  'IngressClass',
  'ValidatingWebhookConfiguration',
  'MutatingWebhookConfiguration',
]);

type ApplicableObject = k8s.KubernetesObject & Record<string, unknown>;

/**
 * API handles the client talks to; injectable for tests
 */
export interface K8sApis {
  core: Pick<k8s.CoreV1Api, 'readNamespace' | 'createNamespace'>;
  apps: Pick<k8s.AppsV1Api, 'readNamespacedDeployment'>;
  custom: Pick<k8s.CustomObjectsApi, 'getNamespacedCustomObject'>;
  objects: Pick<k8s.KubernetesObjectApi, 'read' | 'create' | 'replace'>;
}

export interface K8sClientOptions {
  config?: K8sClientConfig;
  apis?: K8sApis;
}

function isNotFound(error: unknown): boolean {
  return error instanceof k8s.HttpError && error.statusCode === 404;
}

function isConflict(error: unknown): boolean {
  return error instanceof k8s.HttpError && error.statusCode === 409;
}

/**
 * Best-effort message from an API server error body
 */
function describeApiError(error: unknown): string {
  if (error instanceof k8s.HttpError) {
    const body: unknown = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return `${error.statusCode ?? 'unknown status'}: ${body.message}`;
    }
    return `${error.statusCode ?? 'unknown status'}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class K8sClient {
  private apis: K8sApis;
  private fieldManager: string;
  private logger = createChildLogger({ component: 'K8sClient' });

  constructor(options: K8sClientOptions = {}) {
    const config = options.config ?? {};
    this.fieldManager = config.fieldManager ?? DEFAULT_FIELD_MANAGER;

    if (options.apis) {
      this.apis = options.apis;
      return;
    }

    // Initialize Kubernetes client
    const kc = new k8s.KubeConfig();

    if (config.kubeconfig) {
      kc.loadFromFile(config.kubeconfig);
    } else {
      kc.loadFromDefault();
    }

    if (config.context) {
      kc.setCurrentContext(config.context);
    }

    this.apis = {
      core: kc.makeApiClient(k8s.CoreV1Api),
      apps: kc.makeApiClient(k8s.AppsV1Api),
      custom: kc.makeApiClient(k8s.CustomObjectsApi),
      objects: k8s.KubernetesObjectApi.makeApiClient(kc),
    };

    this.logger.info({ context: kc.getCurrentContext() }, 'K8s client initialized');
  }

  // ============================================
  // Namespaces
  // ============================================

  /**
   * Read a namespace, or undefined when it does not exist
   */
  async getNamespace(name: string): Promise<NamespaceInfo | undefined> {
    try {
      const response = await this.apis.core.readNamespace(name);
      const ns = response.body;
      return {
        name: ns.metadata?.name ?? name,
        status: ns.status?.phase === 'Terminating' ? 'Terminating' : 'Active',
        createdAt: ns.metadata?.creationTimestamp
          ? new Date(ns.metadata.creationTimestamp)
          : new Date(),
      };
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new KubectlError(`Failed to read namespace '${name}': ${describeApiError(error)}`, {
        namespace: name,
      });
    }
  }

  async namespaceExists(name: string): Promise<boolean> {
    return (await this.getNamespace(name)) !== undefined;
  }

  /**
   * Create a namespace. A concurrent creation (409) counts as success.
   */
  async createNamespace(name: string): Promise<EnsureNamespaceResult> {
    try {
      await this.apis.core.createNamespace({
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name },
      });
      this.logger.info({ namespace: name }, 'Namespace created');
      return 'created';
    } catch (error) {
      if (isConflict(error)) {
        this.logger.info({ namespace: name }, 'Namespace created concurrently');
        return 'exists';
      }
      throw new KubectlError(`Failed to create namespace '${name}': ${describeApiError(error)}`, {
        namespace: name,
      });
    }
  }

  // ============================================
  // Apply
  // ============================================

  /**
   * Apply rendered documents in order (kubectl apply equivalent).
   * Stops at the first rejected document; earlier ones stay applied.
   */
  async applyResources(docs: ResourceDoc[], namespace: string): Promise<ApplyResourcesResult> {
    const startTime = Date.now();
    const resources: AppliedResource[] = [];

    this.logger.info({ namespace, resourceCount: docs.length }, 'Applying resources');

    for (const doc of docs) {
      const target = this.toKubernetesObject(doc, namespace);
      const ref = `${doc.kind}/${doc.metadata.name}`;

      try {
        const action = await this.applyResource(target);
        const applied: AppliedResource = {
          kind: doc.kind,
          name: doc.metadata.name,
          namespace: target.metadata?.namespace,
          action,
        };
        resources.push(applied);
        logResourceApplied(applied.kind, applied.name, applied.namespace ?? '', action);
      } catch (error) {
        this.logger.error({ resource: ref, errorMessage: describeApiError(error) }, 'Failed to apply resource');
        throw new KubectlError(`Apply of ${ref} rejected: ${describeApiError(error)}`, {
          resource: ref,
          namespace,
          appliedBefore: resources.map((r) => `${r.kind}/${r.name}`),
        });
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.info({ namespace, resourceCount: resources.length, durationMs }, 'Resources applied');

    return { resources, durationMs };
  }

  /**
   * Create when absent, otherwise replace
   */
  private async applyResource(resource: ApplicableObject): Promise<AppliedResource['action']> {
    const header = {
      apiVersion: resource.apiVersion,
      kind: resource.kind,
      metadata: {
        name: resource.metadata?.name ?? '',
        namespace: resource.metadata?.namespace,
      },
    };

    let existing: k8s.KubernetesObject;
    try {
      existing = (await this.apis.objects.read(header)).body;
    } catch (error) {
      if (isNotFound(error)) {
        await this.apis.objects.create(resource, undefined, undefined, this.fieldManager);
        return 'created';
      }
      throw error;
    }

    const replacement: ApplicableObject = {
      ...resource,
      metadata: { ...resource.metadata, resourceVersion: existing.metadata?.resourceVersion },
    };

    // Services keep their allocated clusterIP
    if (resource.kind === 'Service') {
      const clusterIP = readClusterIP(existing);
      if (clusterIP) {
        replacement.spec = { ...readSpec(resource), clusterIP };
      }
    }

    await this.apis.objects.replace(replacement, undefined, undefined, this.fieldManager);
    return 'configured';
  }

  private toKubernetesObject(doc: ResourceDoc, namespace: string): ApplicableObject {
    const { metadata, ...rest } = doc;
    const meta: k8s.V1ObjectMeta = {
      name: metadata.name,
      labels: metadata.labels,
      annotations: metadata.annotations,
    };
    if (!CLUSTER_SCOPED_KINDS.has(doc.kind)) {
      meta.namespace = metadata.namespace ?? namespace;
    }
    return { ...rest, metadata: meta };
  }

  // ============================================
  // Workload status
  // ============================================

  /**
   * Read and evaluate the status of a Deployment or Argo Rollout
   */
  async getWorkloadStatus(kind: WorkloadKind, name: string, namespace: string): Promise<WorkloadStatus> {
    try {
      if (kind === 'Deployment') {
        const response = await this.apis.apps.readNamespacedDeployment(name, namespace);
        return evaluateDeploymentStatus(response.body);
      }

      const response = await this.apis.custom.getNamespacedCustomObject(
        ROLLOUT_API.GROUP,
        ROLLOUT_API.VERSION,
        namespace,
        ROLLOUT_API.PLURAL,
        name
      );
      const parsed = rolloutObjectSchema.safeParse(response.body);
      if (!parsed.success) {
        throw new KubectlError(`Rollout '${name}' returned an unexpected shape: ${parsed.error.message}`, {
          namespace,
        });
      }
      return evaluateRolloutStatus(parsed.data);
    } catch (error) {
      if (error instanceof KubectlError) {
        throw error;
      }
      throw new KubectlError(`Failed to read ${kind} '${name}' status: ${describeApiError(error)}`, {
        namespace,
        workload: name,
      });
    }
  }
}

function readSpec(resource: k8s.KubernetesObject): Record<string, unknown> {
  const spec: unknown = 'spec' in resource ? resource.spec : undefined;
  return isRecord(spec) ? { ...spec } : {};
}

function readClusterIP(resource: k8s.KubernetesObject): string | undefined {
  const clusterIP = readSpec(resource).clusterIP;
  return typeof clusterIP === 'string' && clusterIP !== '' ? clusterIP : undefined;
}
