import { describe, it, expect, beforeEach, vi } from 'vitest';
import { simpleGit } from 'simple-git';
import { LocalGitClient } from '../client/local-git-client.js';

const git = vi.hoisted(() => ({
  revparse: vi.fn(),
  getConfig: vi.fn(),
  addConfig: vi.fn(),
  add: vi.fn(),
  diff: vi.fn(),
  commit: vi.fn(),
  log: vi.fn(),
  push: vi.fn(),
}));

vi.mock('simple-git', () => ({
  simpleGit: vi.fn(() => git),
}));

describe('LocalGitClient', () => {
  let client: LocalGitClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new LocalGitClient();
  });

  it('should open the repository with a single git process', async () => {
    git.revparse.mockResolvedValue('/work/repo');

    expect(await client.getRepoRoot('/work/repo/overlays/prod')).toBe('/work/repo');
    expect(simpleGit).toHaveBeenCalledWith({
      baseDir: '/work/repo/overlays/prod',
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: true,
    });
    expect(git.revparse).toHaveBeenCalledWith(['--show-toplevel']);
  });

  it('should read the abbreviated branch name', async () => {
    git.revparse.mockResolvedValue('main');

    expect(await client.currentBranch('/work/repo')).toBe('main');
    expect(git.revparse).toHaveBeenCalledWith(['--abbrev-ref', 'HEAD']);
  });

  it('should only set identity values that are missing', async () => {
    git.getConfig.mockImplementation((key: string) =>
      Promise.resolve({ key, value: key === 'user.name' ? 'existing' : null })
    );

    await client.ensureIdentity('/work/repo', { name: 'keelson', email: 'keelson@localhost' });

    expect(git.addConfig).toHaveBeenCalledTimes(1);
    expect(git.addConfig).toHaveBeenCalledWith('user.email', 'keelson@localhost', false);
  });

  it('should list staged paths limited to the pathspecs', async () => {
    git.diff.mockResolvedValue('overlays/prod/kustomization.yaml\noverlays/prod/patch.yaml\n');

    const staged = await client.stagedFiles('/work/repo', ['overlays/prod']);

    expect(staged).toEqual(['overlays/prod/kustomization.yaml', 'overlays/prod/patch.yaml']);
    expect(git.diff).toHaveBeenCalledWith(['--cached', '--name-only', '--', 'overlays/prod']);
  });

  it('should return an empty list when nothing is staged', async () => {
    git.diff.mockResolvedValue('');

    expect(await client.stagedFiles('/work/repo')).toEqual([]);
    expect(git.diff).toHaveBeenCalledWith(['--cached', '--name-only']);
  });

  it('should commit the given paths and report the new commit', async () => {
    git.commit.mockResolvedValue({
      commit: '4f2a9c1',
      summary: { changes: 1, insertions: 4, deletions: 1 },
    });
    git.log.mockResolvedValue({
      latest: {
        hash: '4f2a9c1e8b7d6a5f4e3d2c1b0a9f8e7d6c5b4a39',
        message: 'deploy(checkout): prod → v2',
        author_name: 'keelson',
        author_email: 'keelson@localhost',
        date: '2026-01-05T10:00:00Z',
      },
    });

    const info = await client.commit('/work/repo', {
      message: 'deploy(checkout): prod → v2',
      files: ['overlays/prod/kustomization.yaml'],
    });

    expect(git.commit).toHaveBeenCalledWith('deploy(checkout): prod → v2', ['overlays/prod/kustomization.yaml']);
    expect(info).toEqual({
      hash: '4f2a9c1e8b7d6a5f4e3d2c1b0a9f8e7d6c5b4a39',
      shortHash: '4f2a9c1',
      message: 'deploy(checkout): prod → v2',
      author: 'keelson',
      authorEmail: 'keelson@localhost',
      date: new Date('2026-01-05T10:00:00Z'),
      filesChanged: 1,
      insertions: 4,
      deletions: 1,
    });
  });

  it('should push the branch to the remote', async () => {
    git.push.mockResolvedValue({});

    await client.push('/work/repo', { remote: 'origin', branch: 'main' });

    expect(git.push).toHaveBeenCalledWith('origin', 'main');
  });

  it('should propagate push failures', async () => {
    git.push.mockRejectedValue(new Error('fatal: Authentication failed'));

    await expect(client.push('/work/repo', { remote: 'origin', branch: 'main' })).rejects.toThrow(
      'fatal: Authentication failed'
    );
  });
});
