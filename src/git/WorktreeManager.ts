import * as fs from "fs";
import type {
  AddOptions,
  AddResult,
  CleanupOptions,
  CleanupResult,
  FilterThresholds,
  RemoveOptions,
  RemoveResult,
  Report,
  ReportOptions,
  Repository,
  WorktreeEntry,
  WorktreeStatus,
} from "../models";
import type { GitClient } from "./GitClient";
import { discoverRepositories, findRepository } from "../core/discovery";
import {
  collectStatuses,
  compareStatuses,
  computeWorktreeStatus,
  isPrimaryBranch,
} from "../core/status";
import { DEFAULT_THRESHOLDS, type WorktreePredicate, applyFilter, compileFilter } from "../core/filter";
import { summarize } from "../core/summary";
import { getWorktreePath } from "../utils";
import {
  AlreadyExistsError,
  CanopyError,
  NotFoundError,
  UnsafeRemovalError,
  errorMessage,
} from "../utils/errors";
import { type Logger, silentLogger } from "../utils/logger";
import {
  type Semaphore,
  defaultConcurrency,
  mapWithConcurrency,
  mutationLock,
} from "../utils/concurrency";

export interface WorktreeManagerOptions {
  logger?: Logger;
  concurrency?: number;
  thresholds?: FilterThresholds;
  /** Lock serializing mutations with each other and with status reports. */
  lock?: Semaphore;
}

/**
 * Entry point for everything canopy does to the repositories under one root:
 * the filtered status report and the add/remove/cleanup mutations. Mutations
 * re-run discovery and status inspection to check their preconditions.
 */
export class WorktreeManager {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly thresholds: FilterThresholds;
  private readonly lock: Semaphore;

  constructor(
    private readonly root: string,
    private readonly client: GitClient,
    options: WorktreeManagerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.concurrency = options.concurrency ?? defaultConcurrency();
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.lock = options.lock ?? mutationLock;
  }

  getRoot(): string {
    return this.root;
  }

  async listRepositories(): Promise<Repository[]> {
    const { repositories } = await discoverRepositories(this.root, this.client, this.logger);
    return repositories;
  }

  async report(options: ReportOptions = {}): Promise<Report> {
    // Bad age arguments fail here, before any git command runs
    const predicate = compileFilter(options.filter ?? {}, options.now ?? new Date(), this.thresholds);

    return this.lock.run(async () => {
      const { repositories, errors } = await discoverRepositories(this.root, this.client, this.logger);
      const statuses = await collectStatuses(this.client, repositories, {
        concurrency: this.concurrency,
        includePrimary: options.includePrimary,
        logger: this.logger,
      });
      const matching = applyFilter(statuses, predicate);

      return {
        statuses: matching,
        summary: summarize(matching),
        skippedRepositories: errors.flatMap((error) => (error.repository ? [error.repository] : [])),
      };
    });
  }

  async findWorktree(
    repositoryName: string,
    branch: string,
  ): Promise<{ repository: Repository; entry: WorktreeEntry }> {
    const repository = await this.requireRepository(repositoryName);
    const entry = repository.worktrees.find((wt) => wt.branch === branch);
    if (!entry) {
      throw new NotFoundError(
        `No worktree for branch '${branch}' in repository '${repositoryName}'.`,
        { repository: repositoryName, branch },
      );
    }
    return { repository, entry };
  }

  async add(repositoryName: string, branch: string, options: AddOptions = {}): Promise<AddResult> {
    return this.lock.run(async () => {
      const context = { repository: repositoryName, branch };
      const repository = await this.requireRepository(repositoryName);

      const existing = repository.worktrees.find((wt) => wt.branch === branch);
      if (existing) {
        throw new AlreadyExistsError(
          `Branch '${branch}' already has a worktree in '${repositoryName}' at ${existing.path}`,
          context,
        );
      }

      const worktreePath = getWorktreePath(branch, repository.path);
      if (fs.existsSync(worktreePath)) {
        throw new AlreadyExistsError(`Target directory '${worktreePath}' already exists`, context);
      }

      const branchExists = await this.client.branchExists(repository.gitDir, branch);
      const base = branchExists
        ? null
        : await this.resolveBase(repository, options.base ?? (await this.client.getDefaultBranch(repository.gitDir)));

      const plan = {
        repository: repository.name,
        branch,
        path: worktreePath,
        base,
        createBranch: !branchExists,
      };

      if (options.dryRun) {
        return { performed: false, plan };
      }

      try {
        await this.client.addWorktree(repository.gitDir, worktreePath, branch, {
          createBranch: plan.createBranch,
          base: base ?? undefined,
        });
      } catch (error) {
        throw new CanopyError(`Could not add ${repositoryName}/${branch}: ${errorMessage(error)}`, context);
      }
      this.logger.debug(`Added worktree ${repositoryName}/${branch} at ${worktreePath}`);
      return { performed: true, plan };
    });
  }

  async remove(repositoryName: string, branch: string, options: RemoveOptions = {}): Promise<RemoveResult> {
    return this.lock.run(async () => {
      const context = { repository: repositoryName, branch };
      const { repository, entry } = await this.findWorktree(repositoryName, branch);

      if (isPrimaryBranch(branch, await this.primaryBranchOrNull(repository))) {
        throw new UnsafeRemovalError(
          `Refusing to remove the worktree of the primary branch ${repositoryName}/${branch}.`,
          context,
        );
      }

      if (entry.isLocked) {
        throw new UnsafeRemovalError(
          `Worktree ${repositoryName}/${branch} is locked. Unlock it first with 'git worktree unlock'.`,
          context,
        );
      }

      const status = await computeWorktreeStatus(this.client, repository, entry, this.logger);
      const kind = status.local.kind;
      if (!options.force && (kind === "dirty" || kind === "staged" || kind === "unknown")) {
        const reason = kind === "unknown" ? "its local status could not be read" : `it has ${kind} changes`;
        throw new UnsafeRemovalError(
          `Refusing to remove ${repositoryName}/${branch}: ${reason}. Use --force to remove it anyway.`,
          context,
        );
      }

      if (options.dryRun) {
        return { performed: false, status };
      }

      try {
        // A missing worktree only leaves a stale registration behind
        await this.client.removeWorktree(repository.gitDir, entry.path, Boolean(options.force) || kind === "missing");
      } catch (error) {
        throw new CanopyError(`Could not remove ${repositoryName}/${branch}: ${errorMessage(error)}`, context);
      }
      this.logger.debug(`Removed worktree ${repositoryName}/${branch}`);
      return { performed: true, status };
    });
  }

  /**
   * Remove every clean worktree whose branch is already merged into the
   * primary branch. Worktrees with uncommitted or unmerged work are only
   * ever reported as skipped.
   */
  async cleanup(options: CleanupOptions = {}): Promise<CleanupResult> {
    const predicate = compileFilter(options.filter ?? {}, options.now ?? new Date(), this.thresholds);

    return this.lock.run(async () => {
      const result: CleanupResult = { removed: [], planned: [], skipped: [], failed: [] };
      const { repositories } = await discoverRepositories(this.root, this.client, this.logger);

      let targets = repositories;
      if (options.repository !== undefined) {
        const repository = findRepository(repositories, options.repository);
        if (!repository) {
          throw new NotFoundError(`Repository '${options.repository}' not found under ${this.root}`, {
            repository: options.repository,
          });
        }
        targets = [repository];
      }

      for (const repository of targets) {
        await this.cleanupRepository(repository, predicate, options, result);
      }

      result.removed.sort(compareStatuses);
      result.planned.sort(compareStatuses);
      result.skipped.sort((a, b) => compareStatuses(a.status, b.status));
      return result;
    });
  }

  private async cleanupRepository(
    repository: Repository,
    predicate: WorktreePredicate,
    options: CleanupOptions,
    result: CleanupResult,
  ): Promise<void> {
    let primary: string;
    try {
      primary = options.base ?? (await this.client.getDefaultBranch(repository.gitDir));
    } catch (error) {
      this.logger.warn(`${repository.name}: ${errorMessage(error)}`);
      return;
    }

    const primaryTip =
      (await this.client.resolveRef(repository.gitDir, `refs/heads/${primary}`)) ??
      (await this.client.resolveRef(repository.gitDir, `refs/remotes/origin/${primary}`));
    if (primaryTip === null) {
      this.logger.warn(`${repository.name}: primary branch '${primary}' not found, skipping cleanup`);
      return;
    }

    const entries = repository.worktrees.filter((entry) => entry.branch !== primary);
    const locked = new Set(entries.filter((entry) => entry.isLocked).map((entry) => entry.branch));
    const statuses = await mapWithConcurrency(entries, this.concurrency, (entry) =>
      computeWorktreeStatus(this.client, repository, entry, this.logger),
    );

    for (const status of statuses) {
      if (!predicate(status)) {
        continue;
      }

      const reason = locked.has(status.branch)
        ? "worktree is locked"
        : await this.cleanupBlocker(repository, status, primary, primaryTip, options);
      if (reason) {
        result.skipped.push({ status, reason });
        continue;
      }

      if (options.dryRun) {
        result.planned.push(status);
        continue;
      }

      try {
        await this.client.removeWorktree(repository.gitDir, status.path, false);
        result.removed.push(status);
      } catch (error) {
        result.failed.push({
          repository: repository.name,
          branch: status.branch,
          error: errorMessage(error),
        });
      }
    }
  }

  private async cleanupBlocker(
    repository: Repository,
    status: WorktreeStatus,
    primary: string,
    primaryTip: string,
    options: CleanupOptions,
  ): Promise<string | null> {
    switch (status.local.kind) {
      case "clean":
        break;
      case "missing":
        return "worktree directory is missing";
      case "unknown":
        return "local status could not be read";
      default:
        return "has uncommitted changes";
    }

    if (status.head === null) {
      return "branch tip could not be resolved";
    }
    if (!(await this.client.isAncestor(repository.gitDir, status.head, primaryTip))) {
      return `not merged into ${primary}`;
    }
    if ((status.remote.kind === "ahead" || status.remote.kind === "not-pushed") && !options.allowUnpushed) {
      return "has unpushed commits";
    }
    return null;
  }

  private async requireRepository(name: string): Promise<Repository> {
    const repository = findRepository(await this.listRepositories(), name);
    if (!repository) {
      throw new NotFoundError(`Repository '${name}' not found under ${this.root}`, { repository: name });
    }
    return repository;
  }

  private async resolveBase(repository: Repository, base: string): Promise<string> {
    if (await this.client.branchExists(repository.gitDir, base)) {
      return base;
    }
    if ((await this.client.resolveRef(repository.gitDir, `refs/remotes/origin/${base}`)) !== null) {
      return `origin/${base}`;
    }
    throw new NotFoundError(
      `Base branch '${base}' not found locally or on origin in '${repository.name}'`,
      { repository: repository.name, branch: base },
    );
  }

  private async primaryBranchOrNull(repository: Repository): Promise<string | null> {
    try {
      return await this.client.getDefaultBranch(repository.gitDir);
    } catch (error) {
      this.logger.debug(`${repository.name}: ${errorMessage(error)}`);
      return null;
    }
  }
}
