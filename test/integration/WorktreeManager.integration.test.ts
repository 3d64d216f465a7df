import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { execFileSync } from "child_process";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { WorktreeManager } from "../../src/git/WorktreeManager";
import { SimpleGitClient } from "../../src/git/SimpleGitClient";
import { UnsafeRemovalError } from "../../src/utils/errors";

/**
 * Runs against real bare repositories in a temp directory. These catch
 * porcelain parsing and ref handling issues the fake client cannot.
 */

const hasGit = (() => {
  try {
    execFileSync("git", ["--version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
})();

function runGit(cwd: string, ...args: string[]): string {
  return execFileSync(
    "git",
    ["-c", "user.email=test@example.com", "-c", "user.name=Test User", "-C", cwd, ...args],
    { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] },
  ).trim();
}

describe.skipIf(!hasGit)("WorktreeManager Integration Tests", () => {
  let tempDir: string;
  let root: string;
  let gitDir: string;
  let manager: WorktreeManager;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "canopy-test-"));
    root = path.join(tempDir, "root");
    const seed = path.join(tempDir, "seed");
    fs.mkdirSync(root);
    fs.mkdirSync(seed);

    runGit(seed, "init");
    runGit(seed, "symbolic-ref", "HEAD", "refs/heads/main");
    fs.writeFileSync(path.join(seed, "README.md"), "# Test Repository\n");
    runGit(seed, "add", "README.md");
    runGit(seed, "commit", "-m", "Initial commit");

    gitDir = path.join(root, "alpha", ".git");
    runGit(tempDir, "clone", "--bare", seed, gitDir);

    // Something under the root that is not a repository
    fs.mkdirSync(path.join(root, "notes"));

    manager = new WorktreeManager(root, new SimpleGitClient(), { concurrency: 2 });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test("should discover the bare repository and its worktrees", async () => {
    await manager.add("alpha", "feature/login");
    await manager.add("alpha", "bugfix");

    const repositories = await manager.listRepositories();

    expect(repositories.map((repo) => repo.name)).toEqual(["alpha"]);
    expect(repositories[0].worktrees.map((wt) => wt.branch)).toEqual(["bugfix", "feature/login"]);
    expect(repositories[0].worktrees[1].path).toBe(fs.realpathSync(path.join(root, "alpha", "feature", "login")));
  });

  test("should track local changes through dirty, staged and clean", async () => {
    await manager.add("alpha", "feature");
    const worktree = path.join(root, "alpha", "feature");

    const localKind = async (): Promise<string> => {
      const report = await manager.report();
      return report.statuses[0].local.kind;
    };

    expect(await localKind()).toBe("clean");

    fs.writeFileSync(path.join(worktree, "new.txt"), "draft\n");
    expect(await localKind()).toBe("dirty");

    runGit(worktree, "add", "new.txt");
    expect(await localKind()).toBe("staged");

    runGit(worktree, "commit", "-m", "Add draft");
    expect(await localKind()).toBe("clean");

    fs.rmSync(worktree, { recursive: true, force: true });
    expect(await localKind()).toBe("missing");
  });

  test("should compare a branch with its upstream", async () => {
    await manager.add("alpha", "feature");
    const worktree = path.join(root, "alpha", "feature");
    runGit(gitDir, "config", "branch.feature.remote", "origin");
    runGit(gitDir, "config", "branch.feature.merge", "refs/heads/feature");

    let report = await manager.report();
    expect(report.statuses[0].remote).toEqual({ kind: "not-pushed" });

    const base = runGit(gitDir, "rev-parse", "refs/heads/main");
    runGit(gitDir, "update-ref", "refs/remotes/origin/feature", base);
    fs.writeFileSync(path.join(worktree, "a.txt"), "a\n");
    runGit(worktree, "add", "a.txt");
    runGit(worktree, "commit", "-m", "First change");
    fs.writeFileSync(path.join(worktree, "b.txt"), "b\n");
    runGit(worktree, "add", "b.txt");
    runGit(worktree, "commit", "-m", "Second change");

    report = await manager.report();
    expect(report.statuses[0].remote).toEqual({ kind: "ahead", ahead: 2 });
    expect(report.statuses[0].lastCommitSummary).toBe("Second change");
    expect(report.summary.remote.ahead).toBe(1);
  });

  test("should refuse to remove a dirty worktree unless forced", async () => {
    await manager.add("alpha", "feature");
    const worktree = path.join(root, "alpha", "feature");
    fs.writeFileSync(path.join(worktree, "wip.txt"), "unsaved\n");

    await expect(manager.remove("alpha", "feature")).rejects.toBeInstanceOf(UnsafeRemovalError);
    expect(fs.existsSync(worktree)).toBe(true);

    await manager.remove("alpha", "feature", { force: true });
    expect(fs.existsSync(worktree)).toBe(false);
    const repositories = await manager.listRepositories();
    expect(repositories[0].worktrees).toEqual([]);
  });

  test("should clean up merged worktrees and keep unmerged ones", async () => {
    await manager.add("alpha", "done");
    await manager.add("alpha", "ongoing");
    const ongoing = path.join(root, "alpha", "ongoing");
    fs.writeFileSync(path.join(ongoing, "work.txt"), "work\n");
    runGit(ongoing, "add", "work.txt");
    runGit(ongoing, "commit", "-m", "Ongoing work");

    const plan = await manager.cleanup({ dryRun: true });
    expect(plan.planned.map((s) => s.branch)).toEqual(["done"]);
    expect(plan.skipped.map(({ status, reason }) => `${status.branch}: ${reason}`)).toEqual([
      "ongoing: not merged into main",
    ]);

    const result = await manager.cleanup();
    expect(result.removed.map((s) => s.branch)).toEqual(["done"]);
    expect(result.failed).toEqual([]);
    expect(fs.existsSync(path.join(root, "alpha", "done"))).toBe(false);
    expect(fs.existsSync(ongoing)).toBe(true);
  });

  test("should tell merged from unmerged commits", async () => {
    const client = new SimpleGitClient();
    await manager.add("alpha", "ahead");
    const worktree = path.join(root, "alpha", "ahead");
    fs.writeFileSync(path.join(worktree, "c.txt"), "c\n");
    runGit(worktree, "add", "c.txt");
    runGit(worktree, "commit", "-m", "Not on main");

    const main = runGit(gitDir, "rev-parse", "refs/heads/main");
    const tip = runGit(gitDir, "rev-parse", "refs/heads/ahead");

    expect(await client.isAncestor(gitDir, main, tip)).toBe(true);
    expect(await client.isAncestor(gitDir, tip, main)).toBe(false);
  });

  test("should find a bare store behind a .git file", async () => {
    const proj = path.join(root, "proj");
    runGit(tempDir, "clone", "--bare", path.join(tempDir, "seed"), path.join(proj, ".bare"));
    fs.writeFileSync(path.join(proj, ".git"), "gitdir: ./.bare\n");

    await manager.add("proj", "feature");
    const repositories = await manager.listRepositories();

    expect(repositories.map((repo) => repo.name)).toEqual(["alpha", "proj"]);
    expect(repositories[1].gitDir).toBe(path.join(proj, ".bare"));
    expect(repositories[1].worktrees.map((wt) => wt.branch)).toEqual(["feature"]);
  });

  test("should check out an existing branch without recreating it", async () => {
    runGit(gitDir, "branch", "parked", "main");

    const result = await manager.add("alpha", "parked");

    expect(result.plan.createBranch).toBe(false);
    expect(runGit(path.join(root, "alpha", "parked"), "rev-parse", "--abbrev-ref", "HEAD")).toBe("parked");
  });
});
