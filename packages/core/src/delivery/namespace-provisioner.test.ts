import { describe, it, expect, beforeEach, vi } from 'vitest';
import { KubectlError } from '@keelson/shared';
import { NamespaceProvisioner } from './namespace-provisioner.js';

describe('NamespaceProvisioner', () => {
  const cluster = {
    namespaceExists: vi.fn<(name: string) => Promise<boolean>>(),
    createNamespace: vi.fn<(name: string) => Promise<'created' | 'exists'>>(),
  };
  let provisioner: NamespaceProvisioner;

  beforeEach(() => {
    vi.resetAllMocks();
    provisioner = new NamespaceProvisioner(cluster);
  });

  it('should create a missing namespace', async () => {
    cluster.namespaceExists.mockResolvedValue(false);
    cluster.createNamespace.mockResolvedValue('created');

    expect(await provisioner.ensure('shop', true)).toBe('created');
    expect(cluster.createNamespace).toHaveBeenCalledWith('shop');
  });

  it('should leave an existing namespace alone', async () => {
    cluster.namespaceExists.mockResolvedValue(true);

    expect(await provisioner.ensure('shop', true)).toBe('exists');
    expect(cluster.createNamespace).not.toHaveBeenCalled();
  });

  it('should accept losing a creation race', async () => {
    cluster.namespaceExists.mockResolvedValue(false);
    cluster.createNamespace.mockResolvedValue('exists');

    expect(await provisioner.ensure('shop', true)).toBe('exists');
  });

  it('should not touch the cluster when creation is disabled', async () => {
    expect(await provisioner.ensure('shop', false)).toBe('skipped');
    expect(cluster.namespaceExists).not.toHaveBeenCalled();
  });

  it('should propagate cluster errors', async () => {
    cluster.namespaceExists.mockRejectedValue(new KubectlError("Failed to read namespace 'shop': 403: forbidden"));

    await expect(provisioner.ensure('shop', true)).rejects.toBeInstanceOf(KubectlError);
  });
});
