import { type SimpleGit, simpleGit } from "simple-git";
import * as fs from "fs";
import * as path from "path";
import { readFile, readdir, stat } from "fs/promises";
import type {
  AncestryCounts,
  CommitInfo,
  DiffState,
  RepositoryCandidate,
  WorktreeEntry,
} from "../models";
import type { AddWorktreeOptions, GitClient } from "./GitClient";
import { type Logger, silentLogger } from "../utils/logger";
import { errorMessage } from "../utils/errors";

// Constants
const DEFAULT_TIMEOUT_MS = 30000; // 30 seconds for standard operations
export const MAIN_BRANCHES = ["main", "master"] as const;

export interface SimpleGitClientOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * GitClient backed by the git binary through simple-git. Commands run once;
 * a failing command is reported, never retried.
 */
export class SimpleGitClient implements GitClient {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SimpleGitClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  private git(baseDir: string): SimpleGit {
    return simpleGit({
      baseDir,
      timeout: { block: this.timeoutMs },
    });
  }

  private async raw(baseDir: string, args: string[]): Promise<string> {
    const started = Date.now();
    try {
      const output = await this.git(baseDir).raw(args);
      this.logger.debug(`git ${args.join(" ")} (${baseDir}, ${Date.now() - started} ms)`);
      return output;
    } catch (error) {
      this.logger.debug(`git ${args.join(" ")} (${baseDir}) failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  /** Like raw(), but a failing command yields null. */
  private async tryRaw(baseDir: string, args: string[]): Promise<string | null> {
    try {
      return await this.raw(baseDir, args);
    } catch {
      return null;
    }
  }

  async listRepositoryCandidates(root: string): Promise<RepositoryCandidate[]> {
    const entries = await readdir(root, { withFileTypes: true });
    const candidates: RepositoryCandidate[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith(".")) {
        continue;
      }

      const repoDir = path.join(root, entry.name);
      // <name>/.git or <name>/<name>.git holds the bare store, or points to it as a gitfile
      for (const marker of [path.join(repoDir, ".git"), path.join(repoDir, `${entry.name}.git`)]) {
        const gitDir = await resolveGitDir(marker);
        if (gitDir !== null) {
          candidates.push({ name: entry.name, path: repoDir, gitDir });
          break;
        }
      }
    }

    return candidates;
  }

  async isBareRepository(gitDir: string): Promise<boolean> {
    const configResult = await this.raw(gitDir, ["config", "--bool", "core.bare"]);
    return configResult.trim() === "true";
  }

  async listWorktrees(gitDir: string): Promise<WorktreeEntry[]> {
    try {
      const result = await this.raw(gitDir, ["worktree", "list", "--porcelain"]);
      return [...parseWorktreeList(result)];
    } catch (error) {
      throw new Error(`Failed to list worktrees: ${errorMessage(error)}`);
    }
  }

  async localDiffState(worktreePath: string): Promise<DiffState | null> {
    if (!fs.existsSync(worktreePath)) {
      return null;
    }

    const status = await this.git(worktreePath).status();
    return {
      // Index column: anything but blank or the untracked marker is staged
      staged: status.files.some((file) => file.index !== " " && file.index !== "?"),
      unstaged: status.files.some((file) => file.working_dir !== " "),
    };
  }

  async resolveUpstream(gitDir: string, branch: string): Promise<string | null> {
    const remote = await this.tryRaw(gitDir, ["config", "--get", `branch.${branch}.remote`]);
    const merge = await this.tryRaw(gitDir, ["config", "--get", `branch.${branch}.merge`]);
    if (!remote?.trim() || !merge?.trim()) {
      return null;
    }

    const remoteName = remote.trim();
    const mergeRef = merge.trim();
    if (remoteName === ".") {
      return mergeRef;
    }
    return mergeRef.replace(/^refs\/heads\//, `refs/remotes/${remoteName}/`);
  }

  async resolveRef(gitDir: string, ref: string): Promise<string | null> {
    const result = await this.tryRaw(gitDir, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
    const sha = result?.trim();
    return sha ? sha : null;
  }

  async ancestryCounts(gitDir: string, localTip: string, remoteTip: string): Promise<AncestryCounts> {
    const result = await this.raw(gitDir, [
      "rev-list",
      "--left-right",
      "--count",
      `${localTip}...${remoteTip}`,
    ]);
    return parseAncestryCounts(result);
  }

  async lastCommit(gitDir: string, ref: string): Promise<CommitInfo | null> {
    const result = await this.tryRaw(gitDir, ["log", "-1", "--format=%ct%x09%s", ref, "--"]);
    return result === null ? null : parseCommitLine(result);
  }

  async getDefaultBranch(gitDir: string): Promise<string> {
    // Try to get the default branch from the remote HEAD
    const remoteHead = await this.tryRaw(gitDir, ["symbolic-ref", "refs/remotes/origin/HEAD"]);
    if (remoteHead?.trim()) {
      return remoteHead.trim().replace("refs/remotes/origin/", "");
    }

    // A bare clone's own HEAD names the branch it was cloned from
    const head = await this.tryRaw(gitDir, ["symbolic-ref", "--short", "HEAD"]);
    if (head?.trim() && (await this.branchExists(gitDir, head.trim()))) {
      return head.trim();
    }

    for (const candidate of MAIN_BRANCHES) {
      if (await this.branchExists(gitDir, candidate)) {
        return candidate;
      }
    }
    throw new Error(`Could not determine default branch of ${gitDir}. Please specify one with --base.`);
  }

  async branchExists(gitDir: string, ref: string): Promise<boolean> {
    const fullRef = ref.startsWith("refs/") ? ref : `refs/heads/${ref}`;
    return (await this.tryRaw(gitDir, ["rev-parse", "--verify", fullRef])) !== null;
  }

  async isAncestor(gitDir: string, ancestor: string, descendant: string): Promise<boolean> {
    const ancestorId = await this.resolveRef(gitDir, ancestor);
    if (ancestorId === null) {
      return false;
    }
    // git exits 1 without stderr for unrelated histories, which simple-git resolves as ""
    const mergeBase = await this.tryRaw(gitDir, ["merge-base", ancestorId, descendant]);
    return mergeBase?.trim() === ancestorId;
  }

  async addWorktree(
    gitDir: string,
    worktreePath: string,
    branch: string,
    options: AddWorktreeOptions,
  ): Promise<void> {
    const args = ["worktree", "add"];

    if (options.createBranch) {
      args.push("-b", branch, worktreePath);
      if (options.base) {
        args.push(options.base);
      }
    } else {
      args.push(worktreePath, branch);
    }

    try {
      await this.raw(gitDir, args);
    } catch (error) {
      throw new Error(`Failed to add worktree: ${errorMessage(error)}`);
    }
  }

  async removeWorktree(gitDir: string, worktreePath: string, force: boolean): Promise<void> {
    const args = ["worktree", "remove"];
    if (force) {
      args.push("--force");
    }
    args.push(worktreePath);

    try {
      await this.raw(gitDir, args);
    } catch (error) {
      throw new Error(`Failed to remove worktree: ${errorMessage(error)}`);
    }
  }
}

/**
 * Directory git should run in for a `.git` marker: the marker itself, or the
 * target of a `gitdir:` file such as `.git` -> `./.bare`. A gitfile of a
 * linked worktree (its target holds `commondir`) is not a repository.
 */
export async function resolveGitDir(marker: string): Promise<string | null> {
  let info: fs.Stats;
  try {
    info = await stat(marker);
  } catch {
    return null;
  }
  if (info.isDirectory()) {
    return marker;
  }
  if (!info.isFile()) {
    return null;
  }

  const match = /^gitdir:\s*(.+)$/m.exec(await readFile(marker, "utf-8"));
  if (!match) {
    return null;
  }
  const target = path.resolve(path.dirname(marker), match[1].trim());
  return fs.existsSync(path.join(target, "commondir")) ? null : target;
}

/**
 * Parse `git worktree list --porcelain`. The bare repository's own record and
 * detached checkouts carry no branch and are left out.
 */
export function* parseWorktreeList(output: string): Generator<WorktreeEntry, void, unknown> {
  for (const block of output.split(/\n\s*\n/)) {
    let worktreePath: string | null = null;
    let branch: string | null = null;
    let head: string | null = null;
    let isBare = false;
    let isLocked = false;

    for (const line of block.split("\n")) {
      if (line.startsWith("worktree ")) {
        worktreePath = line.substring(9);
      } else if (line.startsWith("HEAD ")) {
        head = line.substring(5);
      } else if (line.startsWith("branch ")) {
        branch = line.substring(7).replace("refs/heads/", "");
      } else if (line === "bare") {
        isBare = true;
      } else if (line === "locked" || line.startsWith("locked ")) {
        isLocked = true;
      }
    }

    if (!worktreePath || isBare || !branch) {
      continue;
    }

    yield {
      branch,
      path: worktreePath,
      head,
      exists: fs.existsSync(worktreePath),
      isLocked,
    };
  }
}

export function parseAncestryCounts(output: string): AncestryCounts {
  const [ahead, behind] = output.trim().split(/\s+/).map((value) => Number.parseInt(value, 10));
  if (!Number.isInteger(ahead) || !Number.isInteger(behind) || ahead < 0 || behind < 0) {
    throw new Error(`Unexpected rev-list output: ${JSON.stringify(output)}`);
  }
  return { ahead, behind };
}

export function parseCommitLine(output: string): CommitInfo | null {
  const line = output.trim();
  const tab = line.indexOf("\t");
  const seconds = Number.parseInt(tab === -1 ? line : line.substring(0, tab), 10);
  if (!Number.isFinite(seconds)) {
    return null;
  }
  return {
    timestamp: new Date(seconds * 1000),
    summary: tab === -1 ? "" : line.substring(tab + 1),
  };
}
