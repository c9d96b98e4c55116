/**
 * Kubernetes client tests
 * The API handles are replaced by in-process fakes.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import * as k8s from '@kubernetes/client-node';
import { KubectlError, type ResourceDoc } from '@keelson/shared';
import { K8sClient } from '../k8s-client.js';

function httpError(statusCode: number, message: string): k8s.HttpError {
  return new k8s.HttpError(new IncomingMessage(new Socket()), { kind: 'Status', message }, statusCode);
}

function ok<T>(body: T) {
  return Promise.resolve({ response: new IncomingMessage(new Socket()), body });
}

const createApis = () => ({
  core: {
    readNamespace: vi.fn(),
    createNamespace: vi.fn(),
  },
  apps: {
    readNamespacedDeployment: vi.fn(),
  },
  custom: {
    getNamespacedCustomObject: vi.fn(),
  },
  objects: {
    read: vi.fn(),
    create: vi.fn(),
    replace: vi.fn(),
  },
});

const deploymentDoc: ResourceDoc = {
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: 'checkout', labels: { app: 'checkout' } },
  spec: { replicas: 2 },
};

const serviceDoc: ResourceDoc = {
  apiVersion: 'v1',
  kind: 'Service',
  metadata: { name: 'checkout', namespace: 'shop' },
  spec: { ports: [{ port: 80 }] },
};

describe('K8sClient', () => {
  let apis: ReturnType<typeof createApis>;
  let client: K8sClient;

  beforeEach(() => {
    apis = createApis();
    client = new K8sClient({ apis });
  });

  describe('namespaces', () => {
    it('should report an existing namespace', async () => {
      apis.core.readNamespace.mockReturnValue(ok({ metadata: { name: 'shop' }, status: { phase: 'Active' } }));

      expect(await client.namespaceExists('shop')).toBe(true);
    });

    it('should report a missing namespace on 404', async () => {
      apis.core.readNamespace.mockRejectedValue(httpError(404, 'namespaces "shop" not found'));

      expect(await client.namespaceExists('shop')).toBe(false);
    });

    it('should raise KubectlError on other read failures', async () => {
      apis.core.readNamespace.mockRejectedValue(httpError(403, 'forbidden'));

      await expect(client.namespaceExists('shop')).rejects.toThrow(
        "Failed to read namespace 'shop': 403: forbidden"
      );
    });

    it('should create a namespace', async () => {
      apis.core.createNamespace.mockReturnValue(ok({ metadata: { name: 'shop' } }));

      expect(await client.createNamespace('shop')).toBe('created');
      expect(apis.core.createNamespace).toHaveBeenCalledWith({
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name: 'shop' },
      });
    });

    it('should treat a creation race as success', async () => {
      apis.core.createNamespace.mockRejectedValue(httpError(409, 'namespaces "shop" already exists'));

      expect(await client.createNamespace('shop')).toBe('exists');
    });
  });

  describe('applyResources', () => {
    it('should create absent resources in the target namespace', async () => {
      apis.objects.read.mockRejectedValue(httpError(404, 'not found'));
      apis.objects.create.mockReturnValue(ok({}));

      const result = await client.applyResources([deploymentDoc], 'shop');

      expect(result.resources).toEqual([{ kind: 'Deployment', name: 'checkout', namespace: 'shop', action: 'created' }]);
      expect(apis.objects.create).toHaveBeenCalledWith(
        {
          apiVersion: 'apps/v1',
          kind: 'Deployment',
          metadata: { name: 'checkout', namespace: 'shop', labels: { app: 'checkout' }, annotations: undefined },
          spec: { replicas: 2 },
        },
        undefined,
        undefined,
        'keelson'
      );
    });

    it('should replace existing resources and keep the service clusterIP', async () => {
      apis.objects.read.mockReturnValue(
        ok({
          apiVersion: 'v1',
          kind: 'Service',
          metadata: { name: 'checkout', namespace: 'shop', resourceVersion: '812' },
          spec: { clusterIP: '10.0.0.12', ports: [{ port: 80 }] },
        })
      );
      apis.objects.replace.mockReturnValue(ok({}));

      const result = await client.applyResources([serviceDoc], 'other');

      expect(result.resources[0]?.action).toBe('configured');
      expect(apis.objects.replace).toHaveBeenCalledWith(
        {
          apiVersion: 'v1',
          kind: 'Service',
          metadata: {
            name: 'checkout',
            namespace: 'shop',
            labels: undefined,
            annotations: undefined,
            resourceVersion: '812',
          },
          spec: { ports: [{ port: 80 }], clusterIP: '10.0.0.12' },
        },
        undefined,
        undefined,
        'keelson'
      );
    });

    it('should not namespace cluster-scoped kinds', async () => {
      apis.objects.read.mockRejectedValue(httpError(404, 'not found'));
      apis.objects.create.mockReturnValue(ok({}));

      const result = await client.applyResources(
        [{ apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'shop' } }],
        'shop'
      );

      expect(result.resources[0]?.namespace).toBeUndefined();
    });

    it('should stop at the first rejected resource without rolling back', async () => {
      apis.objects.read.mockRejectedValue(httpError(404, 'not found'));
      apis.objects.create
        .mockReturnValueOnce(ok({}))
        .mockRejectedValueOnce(httpError(422, 'Service "checkout" is invalid'));

      const error = await client.applyResources([deploymentDoc, serviceDoc], 'shop').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(KubectlError);
      expect(error).toMatchObject({
        message: 'Apply of Service/checkout rejected: 422: Service "checkout" is invalid',
        context: { appliedBefore: ['Deployment/checkout'] },
      });
      expect(apis.objects.create).toHaveBeenCalledTimes(2);
    });
  });

  describe('getWorkloadStatus', () => {
    it('should evaluate a Deployment', async () => {
      apis.apps.readNamespacedDeployment.mockReturnValue(
        ok({
          metadata: { name: 'checkout', namespace: 'shop', generation: 1 },
          spec: { replicas: 1 },
          status: { observedGeneration: 1, replicas: 1, updatedReplicas: 1, readyReplicas: 1, availableReplicas: 1 },
        })
      );

      const status = await client.getWorkloadStatus('Deployment', 'checkout', 'shop');

      expect(status.state).toBe('Succeeded');
      expect(apis.apps.readNamespacedDeployment).toHaveBeenCalledWith('checkout', 'shop');
    });

    it('should read Rollouts through the custom objects API', async () => {
      apis.custom.getNamespacedCustomObject.mockReturnValue(
        ok({
          metadata: { name: 'checkout', namespace: 'shop', generation: 3 },
          spec: { replicas: 2 },
          status: { observedGeneration: '3', phase: 'Progressing', readyReplicas: 1 },
        })
      );

      const status = await client.getWorkloadStatus('Rollout', 'checkout', 'shop');

      expect(status.state).toBe('Progressing');
      expect(status.message).toBe('1/2 replicas ready');
      expect(apis.custom.getNamespacedCustomObject).toHaveBeenCalledWith(
        'argoproj.io',
        'v1alpha1',
        'shop',
        'rollouts',
        'checkout'
      );
    });

    it('should wrap read failures in KubectlError', async () => {
      apis.apps.readNamespacedDeployment.mockRejectedValue(httpError(404, 'deployments.apps "checkout" not found'));

      await expect(client.getWorkloadStatus('Deployment', 'checkout', 'shop')).rejects.toThrow(
        `Failed to read Deployment 'checkout' status: 404: deployments.apps "checkout" not found`
      );
    });
  });
});
