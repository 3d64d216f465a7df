import type { LocalStatusKind, RemoteStatusKind, StatusSummary, WorktreeStatus } from "../models";

/** Totals per status bucket, aggregated over an already filtered list. */
export function summarize(statuses: readonly WorktreeStatus[]): StatusSummary {
  const local: Record<LocalStatusKind, number> = {
    clean: 0,
    dirty: 0,
    staged: 0,
    missing: 0,
    unknown: 0,
  };
  const remote: Record<RemoteStatusKind, number> = {
    "up-to-date": 0,
    ahead: 0,
    behind: 0,
    diverged: 0,
    "not-pushed": 0,
    "not-tracking": 0,
    unknown: 0,
  };
  const repositories = new Set<string>();

  for (const status of statuses) {
    local[status.local.kind]++;
    remote[status.remote.kind]++;
    repositories.add(status.repository);
  }

  return {
    total: statuses.length,
    repositories: repositories.size,
    local,
    remote,
  };
}
