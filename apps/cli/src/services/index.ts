/**
 * CLI Services Module
 * Wires the cluster, renderer and git implementations into the pipeline
 */

import { DeployPipeline } from '@keelson/core';
import { GitOpsCommitter } from '@keelson/git';
import { K8sClient, KustomizeRenderer } from '@keelson/kubernetes';
import { createChildLogger, type Config } from '@keelson/shared';

export interface DeployServices {
  pipeline: DeployPipeline;
}

export function initializeServices(config: Config): DeployServices {
  const logger = createChildLogger({ component: 'DeployPipeline', runId: config.deploy.runId });

  const cluster = new K8sClient({
    config: {
      kubeconfig: config.kubernetes.kubeconfig,
      context: config.kubernetes.context,
    },
  });

  const renderer = new KustomizeRenderer({
    binary: config.kustomize.binary,
    timeoutMs: config.kustomize.timeoutMs,
  });

  const publisher = new GitOpsCommitter({
    workDir: config.deploy.overlayDir,
    config: {
      remote: config.git.remote,
      author: { name: config.git.authorName, email: config.git.authorEmail },
    },
  });

  const pipeline = new DeployPipeline(
    { renderer, cluster, publisher, logger },
    {
      annotationPrefix: config.annotations.prefix,
      defaultNamespace: config.kubernetes.defaultNamespace,
      pollIntervalMs: config.kubernetes.pollIntervalMs,
    }
  );

  return { pipeline };
}
