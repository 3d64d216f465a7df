import type { RemoteStatus } from "../models";
import type { GitClient } from "../git/GitClient";

export function classifyRemoteStatus(ahead: number, behind: number): RemoteStatus {
  if (ahead < 0 || behind < 0 || !Number.isInteger(ahead) || !Number.isInteger(behind)) {
    throw new RangeError(`Commit counts must be non-negative integers (got ${ahead}/${behind})`);
  }
  if (ahead > 0 && behind > 0) {
    return { kind: "diverged", ahead, behind };
  }
  if (ahead > 0) {
    return { kind: "ahead", ahead };
  }
  if (behind > 0) {
    return { kind: "behind", behind };
  }
  return { kind: "up-to-date" };
}

/**
 * Compare a branch with its configured upstream using commit ancestry, so
 * counts stay right after rebases and merges. Only locally cached
 * remote-tracking refs are consulted.
 */
export async function analyzeRemoteStatus(
  client: GitClient,
  gitDir: string,
  branch: string,
  localTip?: string | null,
): Promise<RemoteStatus> {
  const upstream = await client.resolveUpstream(gitDir, branch);
  if (upstream === null) {
    return { kind: "not-tracking" };
  }

  const remoteTip = await client.resolveRef(gitDir, upstream);
  if (remoteTip === null) {
    return { kind: "not-pushed" };
  }

  const tip = localTip ?? (await client.resolveRef(gitDir, `refs/heads/${branch}`));
  if (tip === null) {
    return { kind: "unknown" };
  }

  const { ahead, behind } = await client.ancestryCounts(gitDir, tip, remoteTip);
  return classifyRemoteStatus(ahead, behind);
}
