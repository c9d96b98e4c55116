import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DeployOutputs } from '@keelson/shared';
import { formatOutputs, toOutputLines, writeOutputs } from './outputs.js';

const kubectlOutputs: DeployOutputs = {
  mode: 'kubectl',
  namespace: 'shop',
  deployment: 'checkout',
  managedBy: '',
  dryRun: false,
};

const gitopsOutputs: DeployOutputs = {
  mode: 'gitops',
  namespace: 'shop',
  deployment: 'checkout',
  managedBy: 'argocd',
  dryRun: false,
  changed: true,
  commit: '4f2a9c1e8b7d',
};

describe('formatOutputs', () => {
  it('should report an empty managed_by for kubectl deliveries', () => {
    expect(formatOutputs(kubectlOutputs)).toEqual({
      mode: 'kubectl',
      namespace: 'shop',
      deployment: 'checkout',
      managed_by: '',
      dry_run: 'false',
    });
  });

  it('should include commit details for gitops deliveries', () => {
    expect(formatOutputs(gitopsOutputs)).toEqual({
      mode: 'gitops',
      namespace: 'shop',
      deployment: 'checkout',
      managed_by: 'argocd',
      dry_run: 'false',
      changed: 'true',
      commit: '4f2a9c1e8b7d',
    });
  });
});

describe('toOutputLines', () => {
  it('should write one key=value line per output', () => {
    expect(toOutputLines({ mode: 'kubectl', managed_by: '' })).toBe('mode=kubectl\nmanaged_by=\n');
  });

  it('should keep values on a single line', () => {
    expect(toOutputLines({ note: 'a\nb' })).toBe('note=a b\n');
  });
});

describe('writeOutputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'keelson-outputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should append to the output file', async () => {
    const file = join(dir, 'github_output');
    await writeFile(file, 'previous=1\n');

    await writeOutputs(gitopsOutputs, file);

    expect(await readFile(file, 'utf8')).toBe(
      'previous=1\nmode=gitops\nnamespace=shop\ndeployment=checkout\nmanaged_by=argocd\ndry_run=false\nchanged=true\ncommit=4f2a9c1e8b7d\n'
    );
  });

  it('should print JSON when no output file is configured', async () => {
    const stdout = { write: vi.fn() };

    await writeOutputs(kubectlOutputs, undefined, stdout);

    expect(stdout.write).toHaveBeenCalledWith(
      '{"mode":"kubectl","namespace":"shop","deployment":"checkout","managed_by":"","dry_run":"false"}\n'
    );
  });
});
