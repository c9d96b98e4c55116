/**
 * GitOps Committer
 * Commits the files touched by a deploy and pushes them to the checked-out branch
 */

import { relative } from 'node:path';
import {
  createLogger,
  GitOpsError,
  PushRejectedError,
  type CommitResult,
  type Logger,
} from '@keelson/shared';
import { LocalGitClient } from './client/local-git-client.js';
import { DEFAULT_GIT_CONFIG, PUSH_REJECTED_MARKERS, type GitConfig } from './types.js';

/** Git operations the committer needs */
export type CommitterGitClient = Pick<
  LocalGitClient,
  'getRepoRoot' | 'currentBranch' | 'add' | 'stagedFiles' | 'ensureIdentity' | 'commit' | 'push'
>;

export interface GitOpsCommitterOptions {
  /** Any path inside the checkout, usually the overlay directory */
  workDir: string;
  config?: Partial<GitConfig>;
  client?: CommitterGitClient;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isPushRejection(message: string): boolean {
  const lower = message.toLowerCase();
  return PUSH_REJECTED_MARKERS.some((marker) => lower.includes(marker));
}

export class GitOpsCommitter {
  private readonly workDir: string;
  private readonly config: GitConfig;
  private readonly client: CommitterGitClient;
  private readonly logger: Logger;

  constructor(options: GitOpsCommitterOptions) {
    this.workDir = options.workDir;
    this.config = { ...DEFAULT_GIT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('GitOpsCommitter');
    this.client = options.client ?? new LocalGitClient({ logger: this.logger });
  }

  /**
   * Stage exactly `files`, commit them and push.
   * Returns `no-changes` when staging leaves nothing to commit.
   */
  async commitAndPush(files: string[], message: string): Promise<CommitResult> {
    const repoRoot = await this.step('resolve repository root', () => this.client.getRepoRoot(this.workDir));
    const branch = await this.step('read current branch', () => this.client.currentBranch(repoRoot));
    if (branch === 'HEAD') {
      throw new GitOpsError(`Checkout at ${repoRoot} is on a detached HEAD; cannot push`, { repoRoot });
    }

    const paths = files.map((file) => relative(repoRoot, file));
    if (paths.length === 0) {
      this.logger.info({ branch }, 'No files touched, nothing to commit');
      return { status: 'no-changes', branch };
    }

    await this.step('stage files', () => this.client.add(repoRoot, paths));
    const staged = await this.step('read staged files', () => this.client.stagedFiles(repoRoot, paths));
    if (staged.length === 0) {
      this.logger.info({ branch, files: paths }, 'Staged files carry no changes, nothing to commit');
      return { status: 'no-changes', branch };
    }

    await this.step('configure identity', () => this.client.ensureIdentity(repoRoot, this.config.author));
    const commit = await this.step('commit', () => this.client.commit(repoRoot, { message, files: staged }));

    try {
      await this.client.push(repoRoot, { remote: this.config.remote, branch });
    } catch (error) {
      const detail = errorMessage(error);
      if (isPushRejection(detail)) {
        throw new PushRejectedError(branch, { remote: this.config.remote, commit: commit.hash, detail });
      }
      throw new GitOpsError(`Push to '${branch}' failed: ${detail}`, {
        remote: this.config.remote,
        commit: commit.hash,
      });
    }

    this.logger.info({ branch, commit: commit.shortHash, files: staged }, 'Deploy committed and pushed');
    return { status: 'committed', commit: commit.hash, branch, files: staged };
  }

  private async step<T>(action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof GitOpsError) throw error;
      throw new GitOpsError(`Failed to ${action}: ${errorMessage(error)}`, { workDir: this.workDir });
    }
  }
}
