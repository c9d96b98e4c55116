/**
 * Rollout Waiter
 *
 * States: Pending → Progressing → Succeeded | Failed | TimedOut
 *
 * Polls the primary workload only. Sidecar and migrator workloads are applied
 * but never waited on.
 */

import {
  KeelsonError,
  KubectlError,
  ROLLOUT_STATES,
  createLogger,
  type Logger,
  type RolloutState,
  type WorkloadKind,
  type WorkloadStatus,
} from '@keelson/shared';
import { systemClock, type Clock, type ClusterClient } from '../types.js';

export interface RolloutWaiterOptions {
  cluster: Pick<ClusterClient, 'getWorkloadStatus'>;
  pollIntervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RolloutTarget {
  kind: WorkloadKind;
  name: string;
  namespace: string;
}

export interface RolloutTransition {
  from: RolloutState;
  to: RolloutState;
  /** Milliseconds since the wait started */
  elapsedMs: number;
  message: string;
}

export type TerminalRolloutState = 'Succeeded' | 'Failed' | 'TimedOut';

export interface RolloutWaitResult {
  state: TerminalRolloutState;
  lastStatus?: WorkloadStatus;
  transitions: RolloutTransition[];
  polls: number;
  elapsedMs: number;
}

export class RolloutWaiter {
  private readonly cluster: Pick<ClusterClient, 'getWorkloadStatus'>;
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: RolloutWaiterOptions) {
    this.cluster = options.cluster;
    this.pollIntervalMs = options.pollIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('RolloutWaiter');
  }

  /**
   * Poll until the workload reaches a terminal state or `timeoutSeconds`
   * elapse. Status is read at least once; a read error ends the wait.
   */
  async wait(
    target: RolloutTarget,
    timeoutSeconds: number,
    onTransition?: (transition: RolloutTransition) => void
  ): Promise<RolloutWaitResult> {
    const startedAt = this.clock.now();
    const deadline = startedAt + timeoutSeconds * 1000;
    const transitions: RolloutTransition[] = [];
    let state: RolloutState = ROLLOUT_STATES.PENDING;
    let lastStatus: WorkloadStatus | undefined;
    let polls = 0;

    const moveTo = (next: RolloutState, message: string) => {
      if (next === state) return;
      const transition = { from: state, to: next, elapsedMs: this.clock.now() - startedAt, message };
      transitions.push(transition);
      state = next;
      this.logger.info({ workload: `${target.kind}/${target.name}`, ...transition }, `Rollout ${next}`);
      onTransition?.(transition);
    };

    const finish = (final: TerminalRolloutState): RolloutWaitResult => ({
      state: final,
      lastStatus,
      transitions,
      polls,
      elapsedMs: this.clock.now() - startedAt,
    });

    for (;;) {
      lastStatus = await this.readStatus(target);
      polls++;
      moveTo(lastStatus.state, lastStatus.message);

      if (lastStatus.state === ROLLOUT_STATES.SUCCEEDED || lastStatus.state === ROLLOUT_STATES.FAILED) {
        return finish(lastStatus.state);
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        moveTo(ROLLOUT_STATES.TIMED_OUT, `No terminal state after ${timeoutSeconds}s`);
        return finish(ROLLOUT_STATES.TIMED_OUT);
      }

      await this.clock.sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  private async readStatus(target: RolloutTarget): Promise<WorkloadStatus> {
    try {
      return await this.cluster.getWorkloadStatus(target.kind, target.name, target.namespace);
    } catch (error) {
      if (error instanceof KeelsonError) throw error;
      throw new KubectlError(
        `Failed to read ${target.kind} '${target.name}' status: ${error instanceof Error ? error.message : String(error)}`,
        { namespace: target.namespace }
      );
    }
  }
}
