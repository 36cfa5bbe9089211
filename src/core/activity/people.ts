// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/activity/people`
 * Purpose: Contributor activity index — latest change per user across a set of items.
 * Scope: Pure traversal and fold over item → job → build → change entry. Does not fetch items or cache results.
 * Invariants:
 * - At most one UserInfo per user id.
 * - lastChangeTimestamp(u) is the max enclosing-build timestamp over entries authored by u.
 * - Replacement only on a strictly later timestamp; order among exact ties is unspecified.
 * - Result is frozen and sorted non-increasing by lastChangeTimestamp.
 * Side-effects: none
 * Links: src/features/views/item-collection-view.ts
 * @public
 */

import {
  type Build,
  type BuildProducingJob,
  hasBuildHistory,
  type Item,
  type User,
} from "../views/model";

export interface UserInfo {
  readonly user: User;
  /** Job owning the build that produced lastChangeTimestamp */
  readonly project: BuildProducingJob;
  /** Epoch milliseconds */
  readonly lastChangeTimestamp: number;
}

interface AuthoredChange {
  readonly author: User;
  readonly job: BuildProducingJob;
  readonly build: Build;
}

/**
 * Visits authored change entries in traversal order: items, their jobs, each job's builds, each build's change set.
 * Jobs without a build history and entries without an author are skipped.
 */
function* authoredChanges(items: Iterable<Item>): Generator<AuthoredChange> {
  for (const item of items) {
    for (const job of item.getAllJobs()) {
      if (!hasBuildHistory(job)) continue;
      for (const build of job.buildHistory.getBuilds()) {
        for (const entry of build.changeSet) {
          if (entry.author === null) continue;
          yield { author: entry.author, job, build };
        }
      }
    }
  }
}

/** Newest first */
export function compareByLastChangeDesc(a: UserInfo, b: UserInfo): number {
  return b.lastChangeTimestamp - a.lastChangeTimestamp;
}

/**
 * Build the activity index for a snapshot of items.
 */
export function buildActivityIndex(
  items: Iterable<Item>
): readonly UserInfo[] {
  const latestByUser = new Map<string, UserInfo>();

  for (const { author, job, build } of authoredChanges(items)) {
    const existing = latestByUser.get(author.id);
    if (existing && !(build.timestamp > existing.lastChangeTimestamp)) {
      continue;
    }
    latestByUser.set(
      author.id,
      Object.freeze({
        user: existing?.user ?? author,
        project: job,
        lastChangeTimestamp: build.timestamp,
      })
    );
  }

  return Object.freeze([...latestByUser.values()].sort(compareByLastChangeDesc));
}

/**
 * True as soon as one authored change entry is reachable; same visit order as buildActivityIndex.
 */
export function hasPeople(items: Iterable<Item>): boolean {
  return !authoredChanges(items).next().done;
}
