import { createWorktreeStatus } from "../../src/core/status";
import type { WorktreeStatus } from "../../src/models";

export function makeStatus(overrides: Partial<WorktreeStatus> = {}): WorktreeStatus {
  return createWorktreeStatus({
    repository: "alpha",
    branch: "feature",
    path: "/fake/root/alpha/feature",
    head: "c1",
    local: { kind: "clean" },
    remote: { kind: "up-to-date" },
    lastActivity: null,
    lastCommitSummary: null,
    error: null,
    ...overrides,
  });
}

/** Small deterministic PRNG (mulberry32) for repeatable randomized tests. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
