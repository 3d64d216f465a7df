import { describe, test, expect, vi } from "vitest";
import { discoverRepositories, findRepository } from "../../src/core/discovery";
import { DiscoveryError } from "../../src/utils/errors";
import type { Logger } from "../../src/utils/logger";
import { FakeGitClient } from "../helpers/FakeGitClient";

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (message: string) => warnings.push(message),
    debug: vi.fn(),
  };
}

describe("discoverRepositories", () => {
  test("should order repositories and their worktrees by name", async () => {
    const client = new FakeGitClient();
    client.repository("beta");
    client.worktree("beta", "z");
    client.worktree("beta", "a");
    client.repository("alpha");
    client.worktree("alpha", "z");
    client.worktree("alpha", "a");

    const { repositories, errors } = await discoverRepositories(client.root, client);

    expect(errors).toEqual([]);
    expect(
      repositories.flatMap((repo) => repo.worktrees.map((wt) => `${repo.name}/${wt.branch}`)),
    ).toEqual(["alpha/a", "alpha/z", "beta/a", "beta/z"]);
    expect(repositories[0].path).toBe("/fake/root/alpha");
    expect(repositories[0].gitDir).toBe("/fake/root/alpha/.git");
  });

  test("should skip repositories that are not bare", async () => {
    const client = new FakeGitClient();
    client.repository("plain", { bare: false });
    client.worktree("plain", "feature");
    client.repository("store");

    const { repositories, errors } = await discoverRepositories(client.root, client);

    expect(repositories.map((repo) => repo.name)).toEqual(["store"]);
    expect(errors).toEqual([]);
  });

  test("should skip a malformed repository and keep scanning", async () => {
    const client = new FakeGitClient();
    client.repository("alpha");
    client.worktree("alpha", "feature");
    client.repository("broken").listError = new Error("fatal: not a git repository");
    client.repository("gamma");
    client.worktree("gamma", "fix");
    const logger = recordingLogger();

    const { repositories, errors } = await discoverRepositories(client.root, client, logger);

    expect(repositories.map((repo) => repo.name)).toEqual(["alpha", "gamma"]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DiscoveryError);
    expect(errors[0].repository).toBe("broken");
    expect(errors[0].message).toBe("Could not read repository 'broken': fatal: not a git repository");
    expect(logger.warnings).toEqual(["Could not read repository 'broken': fatal: not a git repository"]);
  });

  test("should return nothing for an empty root", async () => {
    const client = new FakeGitClient();
    const { repositories } = await discoverRepositories(client.root, client);
    expect(repositories).toEqual([]);
  });
});

describe("findRepository", () => {
  test("should find a repository by exact name", async () => {
    const client = new FakeGitClient();
    client.repository("alpha");
    const { repositories } = await discoverRepositories(client.root, client);

    expect(findRepository(repositories, "alpha")?.name).toBe("alpha");
    expect(findRepository(repositories, "alp")).toBeUndefined();
  });
});
