/**
 * Overlay Inspector
 * Finds the workloads of a rendered overlay and picks the primary one.
 */

import {
  MANAGED_BY_LABEL,
  ValidationError,
  isWorkloadKind,
  type DeploymentTarget,
  type RenderedWorkload,
  type ResourceDoc,
} from '@keelson/shared';

export interface InspectOptions {
  serviceName: string;
  /** Namespace for workloads that declare none */
  defaultNamespace: string;
}

export function collectWorkloads(docs: ResourceDoc[], defaultNamespace: string): RenderedWorkload[] {
  const workloads: RenderedWorkload[] = [];
  for (const doc of docs) {
    if (!isWorkloadKind(doc.kind)) continue;
    workloads.push({
      kind: doc.kind,
      name: doc.metadata.name,
      namespace: doc.metadata.namespace ?? defaultNamespace,
      labels: doc.metadata.labels ?? {},
    });
  }
  return workloads;
}

const workloadRef = (workload: RenderedWorkload) => `${workload.kind}/${workload.name}`;

/**
 * The workload named `serviceName`, or the single workload whose name is it
 * plus a dash-separated prefix or suffix (kustomize namePrefix/nameSuffix)
 */
export function selectPrimaryWorkload(workloads: RenderedWorkload[], serviceName: string): RenderedWorkload {
  const exact = workloads.filter((w) => w.name === serviceName);
  if (exact.length === 1 && exact[0]) {
    return exact[0];
  }
  if (exact.length > 1) {
    throw new ValidationError(
      `Several workloads are named '${serviceName}': ${exact.map(workloadRef).join(', ')}`,
      { candidates: exact.map(workloadRef) }
    );
  }

  const partial = workloads.filter(
    (w) => w.name.startsWith(`${serviceName}-`) || w.name.endsWith(`-${serviceName}`)
  );
  if (partial.length === 1 && partial[0]) {
    return partial[0];
  }

  if (partial.length === 0) {
    throw new ValidationError(
      `No workload matches service '${serviceName}'; found ${workloads.map(workloadRef).join(', ')}`,
      { candidates: [] }
    );
  }
  throw new ValidationError(
    `Workload for service '${serviceName}' is ambiguous: ${partial.map(workloadRef).join(', ')}`,
    { candidates: partial.map(workloadRef) }
  );
}

export function inspectOverlay(docs: ResourceDoc[], options: InspectOptions): DeploymentTarget {
  const workloads = collectWorkloads(docs, options.defaultNamespace);
  if (workloads.length === 0) {
    throw new ValidationError('Rendered overlay contains no Deployment or Rollout workloads');
  }

  const namespaces = [...new Set(workloads.map((w) => w.namespace))];
  if (namespaces.length > 1) {
    throw new ValidationError(
      `Workloads span several namespaces: ${workloads.map((w) => `${workloadRef(w)} in ${w.namespace}`).join(', ')}`,
      { namespaces }
    );
  }

  const primary = selectPrimaryWorkload(workloads, options.serviceName);
  const target: DeploymentTarget = {
    namespace: primary.namespace,
    primaryWorkloadName: primary.name,
    primaryWorkloadKind: primary.kind,
    workloads,
  };

  const managedBy = primary.labels[MANAGED_BY_LABEL];
  if (managedBy !== undefined) {
    target.managedBy = managedBy;
  }
  return target;
}
