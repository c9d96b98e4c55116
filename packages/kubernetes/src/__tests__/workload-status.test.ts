/**
 * Workload status evaluation tests
 */
import { describe, it, expect } from 'vitest';
import type * as k8s from '@kubernetes/client-node';
import { evaluateDeploymentStatus, evaluateRolloutStatus, type RolloutObject } from '../workload-status.js';

const createDeployment = (overrides: {
  generation?: number;
  replicas?: number;
  status?: k8s.V1DeploymentStatus;
}): k8s.V1Deployment => ({
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: 'checkout', namespace: 'shop', generation: overrides.generation ?? 2 },
  spec: {
    replicas: overrides.replicas ?? 3,
    selector: { matchLabels: { app: 'checkout' } },
    template: { spec: { containers: [{ name: 'app', image: 'registry.example/checkout:v2' }] } },
  },
  status: overrides.status,
});

const createRollout = (status?: NonNullable<RolloutObject['status']>, replicas = 2): RolloutObject => ({
  apiVersion: 'argoproj.io/v1alpha1',
  kind: 'Rollout',
  metadata: { name: 'checkout', namespace: 'shop', generation: 4 },
  spec: { replicas },
  status: status ? { observedGeneration: '4', ...status } : undefined,
});

describe('evaluateDeploymentStatus', () => {
  it('should be Pending when no status has been reported', () => {
    const status = evaluateDeploymentStatus(createDeployment({}));

    expect(status.state).toBe('Pending');
    expect(status.kind).toBe('Deployment');
    expect(status.desiredReplicas).toBe(3);
  });

  it('should be Pending while the new generation is not observed', () => {
    const status = evaluateDeploymentStatus(
      createDeployment({
        generation: 3,
        status: { observedGeneration: 2, replicas: 3, updatedReplicas: 3, readyReplicas: 3, availableReplicas: 3 },
      })
    );

    expect(status.state).toBe('Pending');
  });

  it('should be Progressing while updated replicas are missing', () => {
    const status = evaluateDeploymentStatus(
      createDeployment({
        status: { observedGeneration: 2, replicas: 3, updatedReplicas: 1, readyReplicas: 3, availableReplicas: 3 },
      })
    );

    expect(status.state).toBe('Progressing');
    expect(status.message).toBe('1 of 3 updated replicas are available');
  });

  it('should be Progressing while old replicas are terminating', () => {
    const status = evaluateDeploymentStatus(
      createDeployment({
        status: { observedGeneration: 2, replicas: 4, updatedReplicas: 3, readyReplicas: 3, availableReplicas: 3 },
      })
    );

    expect(status.state).toBe('Progressing');
    expect(status.message).toBe('1 old replicas are pending termination');
  });

  it('should be Succeeded when all replicas are updated, ready and available', () => {
    const status = evaluateDeploymentStatus(
      createDeployment({
        status: { observedGeneration: 2, replicas: 3, updatedReplicas: 3, readyReplicas: 3, availableReplicas: 3 },
      })
    );

    expect(status.state).toBe('Succeeded');
    expect(status.message).toBe('Deployment "checkout" successfully rolled out');
  });

  it('should be Failed when the progress deadline is exceeded', () => {
    const status = evaluateDeploymentStatus(
      createDeployment({
        status: {
          observedGeneration: 2,
          replicas: 3,
          updatedReplicas: 1,
          conditions: [
            {
              type: 'Progressing',
              status: 'False',
              reason: 'ProgressDeadlineExceeded',
              message: 'ReplicaSet "checkout-7d9" has timed out progressing.',
            },
          ],
        },
      })
    );

    expect(status.state).toBe('Failed');
    expect(status.reason).toBe('ProgressDeadlineExceeded');
    expect(status.message).toBe('ReplicaSet "checkout-7d9" has timed out progressing.');
  });

  it('should be Failed on a replica failure condition', () => {
    const status = evaluateDeploymentStatus(
      createDeployment({
        status: {
          observedGeneration: 2,
          conditions: [{ type: 'ReplicaFailure', status: 'True', reason: 'FailedCreate', message: 'quota exceeded' }],
        },
      })
    );

    expect(status.state).toBe('Failed');
    expect(status.reason).toBe('FailedCreate');
  });
});

describe('evaluateRolloutStatus', () => {
  it('should be Pending before the controller reports a phase', () => {
    expect(evaluateRolloutStatus(createRollout()).state).toBe('Pending');
  });

  it('should be Pending before the controller reports a phase for the current generation', () => {
    const status = evaluateRolloutStatus(createRollout({ readyReplicas: 0 }));

    expect(status.state).toBe('Pending');
    expect(status.message).toBe('Waiting for the rollout controller to report a phase');
  });

  it('should be Pending while the status still describes the previous generation', () => {
    const status = evaluateRolloutStatus(
      createRollout({
        observedGeneration: '3',
        phase: 'Healthy',
        currentPodHash: 'abc',
        stableRS: 'abc',
        readyReplicas: 2,
        availableReplicas: 2,
      })
    );

    expect(status.state).toBe('Pending');
    expect(status.message).toBe('Waiting for the rollout spec update to be observed');
  });

  it('should accept a numeric observedGeneration', () => {
    const status = evaluateRolloutStatus(
      createRollout({ observedGeneration: 4, phase: 'Healthy', currentPodHash: 'abc', stableRS: 'abc', readyReplicas: 2 })
    );

    expect(status.state).toBe('Succeeded');
  });

  it('should be Progressing while paused on a canary step', () => {
    const status = evaluateRolloutStatus(
      createRollout({
        phase: 'Paused',
        currentStepIndex: 1,
        pauseConditions: [{ reason: 'CanaryPauseStep' }],
        currentPodHash: 'new',
        stableRS: 'old',
        readyReplicas: 2,
      })
    );

    expect(status.state).toBe('Progressing');
    expect(status.message).toBe('Rollout paused at step 1 (CanaryPauseStep)');
    expect(status.phase).toBe('Paused');
  });

  it('should not succeed while Healthy but not fully promoted', () => {
    const status = evaluateRolloutStatus(
      createRollout({ phase: 'Healthy', currentPodHash: 'new', stableRS: 'old', readyReplicas: 2 })
    );

    expect(status.state).toBe('Progressing');
  });

  it('should be Succeeded when Healthy and fully promoted', () => {
    const status = evaluateRolloutStatus(
      createRollout({ phase: 'Healthy', currentPodHash: 'abc', stableRS: 'abc', readyReplicas: 2, availableReplicas: 2 })
    );

    expect(status.state).toBe('Succeeded');
    expect(status.message).toBe('Rollout "checkout" fully promoted');
  });

  it('should be Failed when aborted', () => {
    const status = evaluateRolloutStatus(
      createRollout({ phase: 'Degraded', abort: true, message: 'RolloutAborted: metric "error-rate" assessed Failed' })
    );

    expect(status.state).toBe('Failed');
    expect(status.reason).toBe('RolloutAborted');
    expect(status.message).toBe('RolloutAborted: metric "error-rate" assessed Failed');
  });

  it('should be Failed when Degraded', () => {
    const status = evaluateRolloutStatus(createRollout({ phase: 'Degraded', message: 'ProgressDeadlineExceeded' }));

    expect(status.state).toBe('Failed');
    expect(status.reason).toBe('RolloutDegraded');
  });
});
