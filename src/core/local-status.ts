import type { DiffState, LocalStatus } from "../models";
import type { GitClient } from "../git/GitClient";

/** Staged wins over dirty when a worktree has both. */
export function classifyLocalStatus(diff: DiffState | null): LocalStatus {
  if (diff === null) {
    return { kind: "missing" };
  }
  if (diff.staged) {
    return { kind: "staged" };
  }
  if (diff.unstaged) {
    return { kind: "dirty" };
  }
  return { kind: "clean" };
}

export async function inspectLocalStatus(
  client: GitClient,
  worktreePath: string,
  exists: boolean,
): Promise<LocalStatus> {
  // Nothing to inspect once the directory is gone
  if (!exists) {
    return { kind: "missing" };
  }
  return classifyLocalStatus(await client.localDiffState(worktreePath));
}
