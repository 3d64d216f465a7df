import type {
  FilterCriteria,
  FilterThresholds,
  LocalStatusKind,
  RemoteStatusKind,
  WorktreeStatus,
} from "../models";
import { MS_PER_DAY, parseAgeCutoff } from "../utils";
import { errorMessage } from "../utils/errors";

/** How recent the last commit must be for a worktree to count as active. */
export const ACTIVE_WINDOW_DAYS = 7;
/** How old the last commit must be for a clean worktree to count as stale. */
export const STALE_THRESHOLD_DAYS = 30;

export const DEFAULT_THRESHOLDS: FilterThresholds = {
  activeDays: ACTIVE_WINDOW_DAYS,
  staleDays: STALE_THRESHOLD_DAYS,
};

export type WorktreePredicate = (status: WorktreeStatus) => boolean;

export function hasLocal(...kinds: LocalStatusKind[]): WorktreePredicate {
  return (status) => kinds.includes(status.local.kind);
}

export function hasRemote(...kinds: RemoteStatusKind[]): WorktreePredicate {
  return (status) => kinds.includes(status.remote.kind);
}

export function activeSince(cutoff: Date): WorktreePredicate {
  return (status) =>
    status.local.kind !== "missing" &&
    status.lastActivity !== null &&
    status.lastActivity.getTime() >= cutoff.getTime();
}

export const needsAttention: WorktreePredicate = (status) =>
  hasLocal("dirty", "staged")(status) || hasRemote("diverged", "not-pushed")(status);

export function staleBefore(cutoff: Date): WorktreePredicate {
  return (status) => status.local.kind === "clean" && olderThan(cutoff)(status);
}

/** Last activity strictly before the cutoff. Unknown activity passes. */
export function olderThan(cutoff: Date): WorktreePredicate {
  return (status) =>
    status.lastActivity === null || status.lastActivity.getTime() < cutoff.getTime();
}

/** Last activity at or after the cutoff. Unknown activity passes. */
export function newerThan(cutoff: Date): WorktreePredicate {
  return (status) =>
    status.lastActivity === null || status.lastActivity.getTime() >= cutoff.getTime();
}

export function allOf(predicates: WorktreePredicate[]): WorktreePredicate {
  return (status) => predicates.every((predicate) => predicate(status));
}

/**
 * Turn a filter into a single predicate. Every requested condition
 * must hold; selecting several status flags therefore narrows the result
 * (`dirty` + `clean` matches nothing). Age arguments are resolved to
 * cutoff instants here, once, against `now`.
 */
export function compileFilter(
  criteria: FilterCriteria,
  now: Date = new Date(),
  thresholds: FilterThresholds = DEFAULT_THRESHOLDS,
): WorktreePredicate {
  const predicates: WorktreePredicate[] = [];

  for (const kind of criteria.local ?? []) {
    predicates.push(hasLocal(kind));
  }
  for (const kind of criteria.remote ?? []) {
    predicates.push(hasRemote(kind));
  }
  if (criteria.active) {
    predicates.push(activeSince(new Date(now.getTime() - thresholds.activeDays * MS_PER_DAY)));
  }
  if (criteria.needsAttention) {
    predicates.push(needsAttention);
  }
  if (criteria.stale) {
    predicates.push(staleBefore(new Date(now.getTime() - thresholds.staleDays * MS_PER_DAY)));
  }
  if (criteria.olderThan !== undefined) {
    predicates.push(olderThan(parseAgeArgument("--older-than", criteria.olderThan, now)));
  }
  if (criteria.newerThan !== undefined) {
    predicates.push(newerThan(parseAgeArgument("--newer-than", criteria.newerThan, now)));
  }

  return allOf(predicates);
}

function parseAgeArgument(flag: string, value: string, now: Date): Date {
  try {
    return parseAgeCutoff(value, now);
  } catch (error) {
    throw new Error(`Invalid ${flag} value: ${errorMessage(error)}`);
  }
}

export function hasFilters(criteria: FilterCriteria): boolean {
  return describeFilter(criteria).length > 0;
}

export function describeFilter(criteria: FilterCriteria): string[] {
  const parts: string[] = [];
  if (criteria.active) parts.push("active");
  if (criteria.needsAttention) parts.push("needs-attention");
  if (criteria.stale) parts.push("stale");
  parts.push(...(criteria.local ?? []), ...(criteria.remote ?? []));
  if (criteria.olderThan !== undefined) parts.push(`older-than ${criteria.olderThan}`);
  if (criteria.newerThan !== undefined) parts.push(`newer-than ${criteria.newerThan}`);
  return parts;
}

export function applyFilter(
  statuses: readonly WorktreeStatus[],
  predicate: WorktreePredicate,
): WorktreeStatus[] {
  return statuses.filter(predicate);
}
