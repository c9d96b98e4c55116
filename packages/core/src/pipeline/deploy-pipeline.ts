/**
 * Deploy Pipeline
 *
 * Phases: resolving → mutating → inspecting → selecting →
 *   gitops:  committing
 *   kubectl: provisioning → applying → waiting
 * → complete | failed
 *
 * Phases run strictly in sequence. Every failure is fatal; effects already
 * made on the repository or cluster are not undone.
 */

import { EventEmitter } from 'eventemitter3';
import {
  DEPLOY_MODES,
  RolloutFailureError,
  RolloutTimeoutError,
  createChildLogger,
  logPhaseTransition,
  wrapError,
  type DeployOutputs,
  type DeploymentTarget,
  type Logger,
  type ResourceDoc,
  type RunContext,
} from '@keelson/shared';
import { resolveInputs } from '../resolver/index.js';
import { ManifestMutator } from '../mutator/index.js';
import { inspectOverlay } from '../inspector/index.js';
import { NamespaceProvisioner, RolloutWaiter, selectDeployMode } from '../delivery/index.js';
import { systemClock, type Clock } from '../types.js';
import {
  PIPELINE_PHASES,
  type DeployPipelineConfig,
  type DeployPipelineDeps,
  type DeployRequest,
  type PipelineEvents,
  type PipelinePhase,
} from './types.js';

export function defaultCommitMessage(serviceName: string, environment: string, primaryTag: string): string {
  return `deploy(${serviceName}): ${environment} → ${primaryTag}`;
}

export class DeployPipeline extends EventEmitter<PipelineEvents> {
  private readonly deps: DeployPipelineDeps;
  private readonly config: DeployPipelineConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly mutator: ManifestMutator;
  private readonly provisioner: NamespaceProvisioner;
  private readonly waiter: RolloutWaiter;

  private phase: PipelinePhase = PIPELINE_PHASES.IDLE;

  constructor(deps: DeployPipelineDeps, config: DeployPipelineConfig) {
    super();
    this.deps = deps;
    this.config = config;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createChildLogger({ component: 'DeployPipeline' });
    this.mutator = new ManifestMutator({ annotationPrefix: config.annotationPrefix, logger: this.logger });
    this.provisioner = new NamespaceProvisioner(deps.cluster, this.logger);
    this.waiter = new RolloutWaiter({
      cluster: deps.cluster,
      pollIntervalMs: config.pollIntervalMs,
      clock: this.clock,
      logger: this.logger,
    });
  }

  getPhase(): PipelinePhase {
    return this.phase;
  }

  async run(request: DeployRequest): Promise<DeployOutputs> {
    if (this.phase !== PIPELINE_PHASES.IDLE) {
      throw new Error(`Pipeline already ran (phase: ${this.phase})`);
    }

    const startedAt = this.clock.now();
    const runId = request.runId;

    try {
      const outputs = await this.execute(request);
      this.transition(runId, PIPELINE_PHASES.COMPLETE, 'deploy_finished');
      const durationMs = this.clock.now() - startedAt;
      this.logger.info({ runId, ...outputs, durationMs }, 'Deploy complete');
      this.emit('complete', { runId, outputs, durationMs });
      return outputs;
    } catch (error) {
      const failedPhase = this.phase;
      const wrapped = wrapError(error, { runId, phase: failedPhase });
      this.transition(runId, PIPELINE_PHASES.FAILED, wrapped.code);
      this.logger.error(
        { runId, phase: failedPhase, code: wrapped.code, category: wrapped.context.category },
        wrapped.message
      );
      this.emit('failed', { runId, phase: failedPhase, error: wrapped });
      throw wrapped;
    }
  }

  private async execute(request: DeployRequest): Promise<DeployOutputs> {
    const runId = request.runId;

    this.transition(runId, PIPELINE_PHASES.RESOLVING, 'run_started');
    const { imageSpec, envPatches } = resolveInputs(request);
    const primaryTag = imageSpec.images[0].newTag;

    this.transition(runId, PIPELINE_PHASES.MUTATING, 'inputs_resolved');
    const run: RunContext = {
      actor: request.actor,
      runId,
      environment: request.environment,
      serviceName: request.serviceName,
      timestamp: new Date(this.clock.now()),
    };
    const mutation = await this.mutator.mutate({ overlayDir: request.overlayDir, imageSpec, envPatches, run });

    this.transition(runId, PIPELINE_PHASES.INSPECTING, 'overlay_mutated');
    const docs = await this.deps.renderer.render(request.overlayDir);
    const target = inspectOverlay(docs, {
      serviceName: request.serviceName,
      defaultNamespace: this.config.defaultNamespace,
    });
    this.emit('target', { runId, target });

    this.transition(runId, PIPELINE_PHASES.SELECTING, 'overlay_inspected');
    const selection = selectDeployMode({
      forceMode: request.forceMode,
      detectGitops: request.detectGitops,
      managedBy: target.managedBy,
    });
    this.logger.info({ runId, mode: selection.mode, reason: selection.reason, managedBy: target.managedBy }, 'Mode selected');

    const outputs: DeployOutputs = {
      mode: selection.mode,
      namespace: target.namespace,
      deployment: target.primaryWorkloadName,
      managedBy: target.managedBy ?? '',
      dryRun: request.dryRun,
    };

    if (request.dryRun) {
      this.logger.info({ runId, touchedFiles: mutation.touchedFiles }, 'Dry run: skipping delivery');
      return outputs;
    }

    if (selection.mode === DEPLOY_MODES.GITOPS) {
      this.transition(runId, PIPELINE_PHASES.COMMITTING, 'gitops_selected');
      const message =
        request.commitMessage ?? defaultCommitMessage(request.serviceName, request.environment, primaryTag);
      const result = await this.deps.publisher.commitAndPush(mutation.touchedFiles, message);
      return result.status === 'committed'
        ? { ...outputs, changed: true, commit: result.commit }
        : { ...outputs, changed: false };
    }

    await this.deliverWithKubectl(request, docs, target);
    return outputs;
  }

  private async deliverWithKubectl(
    request: DeployRequest,
    docs: ResourceDoc[],
    target: DeploymentTarget
  ): Promise<void> {
    const runId = request.runId;

    this.transition(runId, PIPELINE_PHASES.PROVISIONING, 'kubectl_selected');
    await this.provisioner.ensure(target.namespace, request.createNamespace);

    this.transition(runId, PIPELINE_PHASES.APPLYING, 'namespace_ready');
    await this.deps.cluster.applyResources(docs, target.namespace);

    this.transition(runId, PIPELINE_PHASES.WAITING, 'resources_applied');
    const result = await this.waiter.wait(
      { kind: target.primaryWorkloadKind, name: target.primaryWorkloadName, namespace: target.namespace },
      request.waitTimeoutSeconds,
      (transition) => this.emit('rollout:transition', { runId, transition })
    );

    if (result.state === 'Failed') {
      throw new RolloutFailureError(target.primaryWorkloadName, result.lastStatus, { runId });
    }
    if (result.state === 'TimedOut') {
      throw new RolloutTimeoutError(target.primaryWorkloadName, request.waitTimeoutSeconds, result.lastStatus, {
        runId,
      });
    }
  }

  private transition(runId: string, to: PipelinePhase, reason: string): void {
    const from = this.phase;
    this.phase = to;
    logPhaseTransition(runId, from, to, reason);
    this.emit('phase', { runId, from, to });
  }
}
