import type {
  AncestryCounts,
  CommitInfo,
  DiffState,
  RepositoryCandidate,
  WorktreeEntry,
} from "../models";

export interface AddWorktreeOptions {
  /** Create `branch` with `git worktree add -b`; otherwise check out the existing branch. */
  createBranch: boolean;
  /** Start point for a new branch. */
  base?: string;
}

/**
 * Everything the status engine needs to know about repositories on disk.
 * Implementations report facts only; deciding what they mean is left to
 * the callers in src/core.
 */
export interface GitClient {
  listRepositoryCandidates(root: string): Promise<RepositoryCandidate[]>;
  isBareRepository(gitDir: string): Promise<boolean>;
  listWorktrees(gitDir: string): Promise<WorktreeEntry[]>;

  /** Staged/unstaged state of a worktree, or null when the path does not exist. */
  localDiffState(worktreePath: string): Promise<DiffState | null>;
  /** Full name of the branch's upstream ref, or null when none is configured. */
  resolveUpstream(gitDir: string, branch: string): Promise<string | null>;
  /** Commit id a ref points to, or null when it does not resolve. */
  resolveRef(gitDir: string, ref: string): Promise<string | null>;
  ancestryCounts(gitDir: string, localTip: string, remoteTip: string): Promise<AncestryCounts>;
  lastCommit(gitDir: string, ref: string): Promise<CommitInfo | null>;

  getDefaultBranch(gitDir: string): Promise<string>;
  branchExists(gitDir: string, ref: string): Promise<boolean>;
  /** True when `ancestor` is reachable from `descendant`. */
  isAncestor(gitDir: string, ancestor: string, descendant: string): Promise<boolean>;

  addWorktree(
    gitDir: string,
    worktreePath: string,
    branch: string,
    options: AddWorktreeOptions,
  ): Promise<void>;
  removeWorktree(gitDir: string, worktreePath: string, force: boolean): Promise<void>;
}
