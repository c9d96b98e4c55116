/**
 * Local Git Client
 * Handles local git operations using simple-git
 */

import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { createLogger, type Logger } from '@keelson/shared';
import type { CommitOptions, GitAuthor, GitCommitInfo, PushOptions } from '../types.js';

export interface LocalGitClientOptions {
  logger?: Logger;
}

export class LocalGitClient {
  private readonly logger: Logger;

  constructor(options: LocalGitClientOptions = {}) {
    this.logger = options.logger ?? createLogger('LocalGitClient');
  }

  /**
   * Get a simple-git instance for a repository path
   */
  private getGit(repoPath: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: repoPath,
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: true,
    };
    return simpleGit(options);
  }

  /**
   * Absolute path of the working tree containing `path`
   */
  async getRepoRoot(path: string): Promise<string> {
    return this.getGit(path).revparse(['--show-toplevel']);
  }

  /**
   * Name of the checked-out branch, or 'HEAD' when detached
   */
  async currentBranch(repoPath: string): Promise<string> {
    return this.getGit(repoPath).revparse(['--abbrev-ref', 'HEAD']);
  }

  /**
   * Configure a commit identity unless the checkout already has one
   */
  async ensureIdentity(repoPath: string, author: GitAuthor): Promise<void> {
    const git = this.getGit(repoPath);
    const [email, name] = await Promise.all([git.getConfig('user.email'), git.getConfig('user.name')]);

    if (!email.value) {
      await git.addConfig('user.email', author.email, false);
    }
    if (!name.value) {
      await git.addConfig('user.name', author.name, false);
    }
  }

  /**
   * Stage files for commit
   */
  async add(repoPath: string, files: string[]): Promise<void> {
    const git = this.getGit(repoPath);
    await git.add(files);

    this.logger.debug({ repoPath, files }, 'Files staged');
  }

  /**
   * Staged paths, optionally limited to the given pathspecs
   */
  async stagedFiles(repoPath: string, files: string[] = []): Promise<string[]> {
    const git = this.getGit(repoPath);
    const args = ['--cached', '--name-only'];
    if (files.length > 0) {
      args.push('--', ...files);
    }
    const output = await git.diff(args);
    return output.split('\n').map((line) => line.trim()).filter(Boolean);
  }

  /**
   * Commit the given paths only
   */
  async commit(repoPath: string, options: CommitOptions): Promise<GitCommitInfo> {
    const git = this.getGit(repoPath);

    const result = await git.commit(options.message, options.files);

    this.logger.info(
      { repoPath, commit: result.commit, message: options.message },
      'Changes committed'
    );

    // Get commit details
    const log = await git.log({ maxCount: 1 });
    const latest = log.latest;

    return {
      hash: latest?.hash ?? result.commit,
      shortHash: (latest?.hash ?? result.commit).substring(0, 7),
      message: latest?.message ?? options.message,
      author: latest?.author_name ?? '',
      authorEmail: latest?.author_email ?? '',
      date: latest ? new Date(latest.date) : new Date(),
      filesChanged: result.summary.changes,
      insertions: result.summary.insertions,
      deletions: result.summary.deletions,
    };
  }

  /**
   * Push to remote
   */
  async push(repoPath: string, options: PushOptions): Promise<void> {
    const git = this.getGit(repoPath);

    this.logger.info({ repoPath, remote: options.remote, branch: options.branch }, 'Pushing to remote');

    await git.push(options.remote, options.branch);

    this.logger.info({ repoPath, remote: options.remote, branch: options.branch }, 'Push completed');
  }
}
