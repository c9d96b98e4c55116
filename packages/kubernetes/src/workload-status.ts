/**
 * Workload status evaluation
 * Maps Deployment and Argo Rollout status blocks onto rollout states,
 * following the checks `kubectl rollout status` and
 * `kubectl argo rollouts status` perform.
 */

import type * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { ROLLOUT_STATES, type ObservedRolloutState, type WorkloadStatus } from '@keelson/shared';

/**
 * Shape of the Rollout fields we read. Everything else passes through.
 */
export const rolloutObjectSchema = z
  .object({
    metadata: z
      .object({
        name: z.string().optional(),
        namespace: z.string().optional(),
        generation: z.number().optional(),
      })
      .passthrough()
      .optional(),
    spec: z
      .object({
        replicas: z.number().int().nonnegative().optional(),
      })
      .passthrough()
      .optional(),
    status: z
      .object({
        // Argo writes observedGeneration as a string
        observedGeneration: z.union([z.string(), z.number()]).optional(),
        phase: z.string().optional(),
        message: z.string().optional(),
        abort: z.boolean().optional(),
        replicas: z.number().optional(),
        updatedReplicas: z.number().optional(),
        readyReplicas: z.number().optional(),
        availableReplicas: z.number().optional(),
        currentPodHash: z.string().optional(),
        stableRS: z.string().optional(),
        currentStepIndex: z.number().optional(),
        pauseConditions: z.array(z.object({ reason: z.string().optional() }).passthrough()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type RolloutObject = z.infer<typeof rolloutObjectSchema>;

/**
 * Evaluate a Deployment read from the API server
 */
export function evaluateDeploymentStatus(deployment: k8s.V1Deployment): WorkloadStatus {
  const name = deployment.metadata?.name ?? '';
  const namespace = deployment.metadata?.namespace ?? '';
  const desiredReplicas = deployment.spec?.replicas ?? 1;
  const status = deployment.status;

  const base = {
    kind: 'Deployment' as const,
    name,
    namespace,
    desiredReplicas,
    updatedReplicas: status?.updatedReplicas ?? 0,
    readyReplicas: status?.readyReplicas ?? 0,
    availableReplicas: status?.availableReplicas ?? 0,
  };

  const generation = deployment.metadata?.generation ?? 0;
  const observedGeneration = status?.observedGeneration;

  if (!status || observedGeneration === undefined || observedGeneration < generation) {
    return {
      ...base,
      state: ROLLOUT_STATES.PENDING,
      message: 'Waiting for the deployment spec update to be observed',
    };
  }

  const conditions = status.conditions ?? [];
  const progressing = conditions.find((c) => c.type === 'Progressing');
  const replicaFailure = conditions.find((c) => c.type === 'ReplicaFailure');

  if (progressing?.status === 'False' && progressing.reason === 'ProgressDeadlineExceeded') {
    return {
      ...base,
      state: ROLLOUT_STATES.FAILED,
      message: progressing.message ?? `Deployment "${name}" exceeded its progress deadline`,
      reason: progressing.reason,
    };
  }

  if (replicaFailure?.status === 'True') {
    return {
      ...base,
      state: ROLLOUT_STATES.FAILED,
      message: replicaFailure.message ?? 'Replica creation failed',
      reason: replicaFailure.reason ?? 'ReplicaFailure',
    };
  }

  const totalReplicas = status.replicas ?? 0;
  let state: ObservedRolloutState = ROLLOUT_STATES.PROGRESSING;
  let message: string;

  if (base.updatedReplicas < desiredReplicas) {
    message = `${base.updatedReplicas} of ${desiredReplicas} updated replicas are available`;
  } else if (totalReplicas > base.updatedReplicas) {
    message = `${totalReplicas - base.updatedReplicas} old replicas are pending termination`;
  } else if (base.availableReplicas < base.updatedReplicas) {
    message = `${base.availableReplicas} of ${base.updatedReplicas} updated replicas are available`;
  } else if (base.readyReplicas < desiredReplicas) {
    message = `${base.readyReplicas}/${desiredReplicas} replicas ready`;
  } else {
    state = ROLLOUT_STATES.SUCCEEDED;
    message = `Deployment "${name}" successfully rolled out`;
  }

  return { ...base, state, message };
}

/**
 * Evaluate an Argo Rollout read through the custom objects API
 */
export function evaluateRolloutStatus(rollout: RolloutObject): WorkloadStatus {
  const name = rollout.metadata?.name ?? '';
  const namespace = rollout.metadata?.namespace ?? '';
  const desiredReplicas = rollout.spec?.replicas ?? 1;
  const status = rollout.status;

  const base = {
    kind: 'Rollout' as const,
    name,
    namespace,
    desiredReplicas,
    updatedReplicas: status?.updatedReplicas ?? 0,
    readyReplicas: status?.readyReplicas ?? 0,
    availableReplicas: status?.availableReplicas ?? 0,
    phase: status?.phase,
  };

  const generation = rollout.metadata?.generation ?? 0;
  const observedGeneration = status?.observedGeneration;

  if (!status || observedGeneration === undefined || String(observedGeneration) !== String(generation)) {
    return {
      ...base,
      state: ROLLOUT_STATES.PENDING,
      message: 'Waiting for the rollout spec update to be observed',
    };
  }

  if (status.abort === true) {
    return {
      ...base,
      state: ROLLOUT_STATES.FAILED,
      message: status.message ?? 'Rollout aborted',
      reason: 'RolloutAborted',
    };
  }

  if (!status.phase) {
    return {
      ...base,
      state: ROLLOUT_STATES.PENDING,
      message: 'Waiting for the rollout controller to report a phase',
    };
  }

  if (status.phase === 'Degraded') {
    return {
      ...base,
      state: ROLLOUT_STATES.FAILED,
      message: status.message ?? 'Rollout degraded',
      reason: 'RolloutDegraded',
    };
  }

  const fullyPromoted =
    status.currentPodHash !== undefined && status.stableRS === status.currentPodHash;

  if (status.phase === 'Healthy' && fullyPromoted && base.readyReplicas >= desiredReplicas) {
    return {
      ...base,
      state: ROLLOUT_STATES.SUCCEEDED,
      message: `Rollout "${name}" fully promoted`,
    };
  }

  if (status.phase === 'Paused') {
    const reason = status.pauseConditions?.[0]?.reason;
    const step = status.currentStepIndex !== undefined ? ` at step ${status.currentStepIndex}` : '';
    return {
      ...base,
      state: ROLLOUT_STATES.PROGRESSING,
      message: `Rollout paused${step}${reason ? ` (${reason})` : ''}`,
      reason,
    };
  }

  return {
    ...base,
    state: ROLLOUT_STATES.PROGRESSING,
    message: status.message ?? `${base.readyReplicas}/${desiredReplicas} replicas ready`,
  };
}
