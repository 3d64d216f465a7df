import type {
  LocalStatus,
  RemoteStatus,
  Repository,
  WorktreeEntry,
  WorktreeStatus,
} from "../models";
import type { GitClient } from "../git/GitClient";
import { InspectionError, errorMessage } from "../utils/errors";
import { type Logger, silentLogger } from "../utils/logger";
import { defaultConcurrency, mapWithConcurrency } from "../utils/concurrency";
import { inspectLocalStatus } from "./local-status";
import { analyzeRemoteStatus } from "./remote-status";
import { compareNames } from "./discovery";

export interface CollectOptions {
  concurrency?: number;
  /** Keep the worktree of each repository's primary branch. */
  includePrimary?: boolean;
  logger?: Logger;
}

export function createWorktreeStatus(fields: WorktreeStatus): WorktreeStatus {
  return Object.freeze({
    ...fields,
    local: Object.freeze({ ...fields.local }),
    remote: Object.freeze({ ...fields.remote }),
  });
}

/**
 * Build the status snapshot of one worktree. Local and remote inspection
 * fail independently: whichever part cannot be read becomes `unknown` and
 * the failure is kept in `error`.
 */
export async function computeWorktreeStatus(
  client: GitClient,
  repository: Repository,
  entry: WorktreeEntry,
  logger: Logger = silentLogger,
): Promise<WorktreeStatus> {
  const failures: string[] = [];
  const context = { repository: repository.name, branch: entry.branch };

  const record = (part: string, error: unknown): void => {
    const failure = new InspectionError(
      `${repository.name}/${entry.branch}: ${part} inspection failed: ${errorMessage(error)}`,
      context,
    );
    logger.warn(failure.message);
    failures.push(failure.message);
  };

  let local: LocalStatus;
  try {
    local = await inspectLocalStatus(client, entry.path, entry.exists);
  } catch (error) {
    record("local", error);
    local = { kind: "unknown" };
  }

  let head: string | null = entry.head;
  let remote: RemoteStatus;
  try {
    head = (await client.resolveRef(repository.gitDir, `refs/heads/${entry.branch}`)) ?? head;
    remote = await analyzeRemoteStatus(client, repository.gitDir, entry.branch, head);
  } catch (error) {
    record("remote", error);
    remote = { kind: "unknown" };
  }

  let lastActivity: Date | null = null;
  let lastCommitSummary: string | null = null;
  try {
    const commit = await client.lastCommit(repository.gitDir, `refs/heads/${entry.branch}`);
    lastActivity = commit?.timestamp ?? null;
    lastCommitSummary = commit?.summary ?? null;
  } catch (error) {
    logger.debug(`${repository.name}/${entry.branch}: no commit info: ${errorMessage(error)}`);
  }

  return createWorktreeStatus({
    repository: repository.name,
    branch: entry.branch,
    path: entry.path,
    head,
    local,
    remote,
    lastActivity,
    lastCommitSummary,
    error: failures.length > 0 ? failures.join("; ") : null,
  });
}

export function compareStatuses(a: WorktreeStatus, b: WorktreeStatus): number {
  return compareNames(a.repository, b.repository) || compareNames(a.branch, b.branch);
}

/**
 * Primary branch of each repository, looked up once per repository. A
 * repository whose default branch cannot be determined falls back to
 * main/master matching.
 */
export async function resolvePrimaryBranches(
  client: GitClient,
  repositories: Repository[],
  logger: Logger = silentLogger,
): Promise<Map<string, string | null>> {
  const primaries = new Map<string, string | null>();
  for (const repository of repositories) {
    try {
      primaries.set(repository.name, await client.getDefaultBranch(repository.gitDir));
    } catch (error) {
      logger.debug(`${repository.name}: ${errorMessage(error)}`);
      primaries.set(repository.name, null);
    }
  }
  return primaries;
}

export function isPrimaryBranch(branch: string, primary: string | null | undefined): boolean {
  return primary ? branch === primary : branch === "main" || branch === "master";
}

/**
 * Status of every worktree in `repositories`, computed on a bounded pool of
 * concurrent inspections and returned in repository/branch order.
 */
export async function collectStatuses(
  client: GitClient,
  repositories: Repository[],
  options: CollectOptions = {},
): Promise<WorktreeStatus[]> {
  const logger = options.logger ?? silentLogger;
  const primaries = options.includePrimary
    ? new Map<string, string | null>()
    : await resolvePrimaryBranches(client, repositories, logger);

  const work = repositories.flatMap((repository) =>
    repository.worktrees
      .filter(
        (entry) =>
          options.includePrimary || !isPrimaryBranch(entry.branch, primaries.get(repository.name)),
      )
      .map((entry) => ({ repository, entry })),
  );

  const statuses = await mapWithConcurrency(
    work,
    options.concurrency ?? defaultConcurrency(),
    ({ repository, entry }) => computeWorktreeStatus(client, repository, entry, logger),
  );

  return statuses.sort(compareStatuses);
}
