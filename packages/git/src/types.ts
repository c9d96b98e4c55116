/**
 * Git Configuration Types
 */

export interface GitConfig {
  /** Remote pushed to after committing */
  remote: string;
  /** Identity used when the checkout has none configured */
  author: GitAuthor;
}

export interface GitAuthor {
  name: string;
  email: string;
}

export interface GitCommitInfo {
  hash: string;
  shortHash: string;
  message: string;
  author: string;
  authorEmail: string;
  date: Date;
  filesChanged: number;
  insertions: number;
  deletions: number;
}

export interface CommitOptions {
  message: string;
  /** Commit only these paths (relative to the repository root) */
  files: string[];
}

export interface PushOptions {
  remote: string;
  branch: string;
}

export const DEFAULT_GIT_CONFIG: GitConfig = {
  remote: 'origin',
  author: {
    name: 'keelson',
    email: 'keelson@localhost',
  },
};

/**
 * Fragments git prints when the remote has commits the local branch lacks.
 * Hook and protected-branch denials print `[remote rejected]` instead.
 */
export const PUSH_REJECTED_MARKERS = ['[rejected]', 'non-fast-forward', 'fetch first'];
