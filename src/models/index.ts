export type LocalStatus =
  | { kind: "clean" }
  | { kind: "dirty" }
  | { kind: "staged" }
  | { kind: "missing" }
  | { kind: "unknown" };

export type RemoteStatus =
  | { kind: "up-to-date" }
  | { kind: "ahead"; ahead: number }
  | { kind: "behind"; behind: number }
  | { kind: "diverged"; ahead: number; behind: number }
  | { kind: "not-pushed" }
  | { kind: "not-tracking" }
  | { kind: "unknown" };

export type LocalStatusKind = LocalStatus["kind"];
export type RemoteStatusKind = RemoteStatus["kind"];

/** One record of `git worktree list --porcelain`, bare entry excluded. */
export interface WorktreeEntry {
  branch: string;
  path: string;
  head: string | null;
  exists: boolean;
  isLocked: boolean;
}

export interface RepositoryCandidate {
  name: string;
  /** Directory that holds the bare store and its worktrees. */
  path: string;
  gitDir: string;
}

export interface Repository extends RepositoryCandidate {
  worktrees: WorktreeEntry[];
}

export interface DiffState {
  staged: boolean;
  unstaged: boolean;
}

export interface AncestryCounts {
  ahead: number;
  behind: number;
}

export interface CommitInfo {
  timestamp: Date;
  summary: string;
}

export interface WorktreeStatus {
  readonly repository: string;
  readonly branch: string;
  readonly path: string;
  readonly head: string | null;
  readonly local: LocalStatus;
  readonly remote: RemoteStatus;
  /** Last commit time of the branch; null when it could not be read. */
  readonly lastActivity: Date | null;
  readonly lastCommitSummary: string | null;
  readonly error: string | null;
}

export interface StatusSummary {
  total: number;
  repositories: number;
  local: Record<LocalStatusKind, number>;
  remote: Record<RemoteStatusKind, number>;
}

export interface FilterCriteria {
  local?: LocalStatusKind[];
  remote?: RemoteStatusKind[];
  active?: boolean;
  needsAttention?: boolean;
  stale?: boolean;
  olderThan?: string;
  newerThan?: string;
}

export interface FilterThresholds {
  activeDays: number;
  staleDays: number;
}

export interface AddOptions {
  base?: string;
  dryRun?: boolean;
}

export interface AddPlan {
  repository: string;
  branch: string;
  path: string;
  /** Start point of the new branch; null when an existing branch is checked out. */
  base: string | null;
  createBranch: boolean;
}

export interface AddResult {
  performed: boolean;
  plan: AddPlan;
}

export interface RemoveOptions {
  force?: boolean;
  dryRun?: boolean;
}

export interface RemoveResult {
  performed: boolean;
  status: WorktreeStatus;
}

export interface ReportOptions {
  filter?: FilterCriteria;
  includePrimary?: boolean;
  now?: Date;
}

export interface Report {
  statuses: WorktreeStatus[];
  summary: StatusSummary;
  /** Repositories skipped during discovery. */
  skippedRepositories: string[];
}

export interface CleanupOptions {
  repository?: string;
  base?: string;
  dryRun?: boolean;
  allowUnpushed?: boolean;
  filter?: FilterCriteria;
  now?: Date;
}

export interface CleanupSkip {
  status: WorktreeStatus;
  reason: string;
}

export interface CleanupFailure {
  repository: string;
  branch: string;
  error: string;
}

export interface CleanupResult {
  removed: WorktreeStatus[];
  planned: WorktreeStatus[];
  skipped: CleanupSkip[];
  failed: CleanupFailure[];
}
