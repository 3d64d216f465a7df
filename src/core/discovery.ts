import type { Repository } from "../models";
import type { GitClient } from "../git/GitClient";
import { DiscoveryError, errorMessage } from "../utils/errors";
import { type Logger, silentLogger } from "../utils/logger";

export interface DiscoveryResult {
  repositories: Repository[];
  /** Repositories that were skipped because they could not be read. */
  errors: DiscoveryError[];
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Find every bare repository directly under `root` and list its linked
 * worktrees. Output is ordered by repository name, then branch name.
 * A repository that fails to open is skipped and reported in `errors`.
 */
export async function discoverRepositories(
  root: string,
  client: GitClient,
  logger: Logger = silentLogger,
): Promise<DiscoveryResult> {
  const candidates = await client.listRepositoryCandidates(root);
  const repositories: Repository[] = [];
  const errors: DiscoveryError[] = [];

  for (const candidate of [...candidates].sort((a, b) => compareNames(a.name, b.name))) {
    try {
      if (!(await client.isBareRepository(candidate.gitDir))) {
        logger.debug(`Skipping ${candidate.name}: not a bare repository`);
        continue;
      }

      const worktrees = await client.listWorktrees(candidate.gitDir);
      repositories.push({
        ...candidate,
        worktrees: [...worktrees].sort((a, b) => compareNames(a.branch, b.branch)),
      });
    } catch (error) {
      const failure = new DiscoveryError(
        `Could not read repository '${candidate.name}': ${errorMessage(error)}`,
        { repository: candidate.name },
      );
      logger.warn(failure.message);
      errors.push(failure);
    }
  }

  return { repositories, errors };
}

export function findRepository(repositories: Repository[], name: string): Repository | undefined {
  return repositories.find((repository) => repository.name === name);
}
