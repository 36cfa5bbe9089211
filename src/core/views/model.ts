// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/views/model`
 * Purpose: Domain types for the item → job → build → change-entry hierarchy walked by views.
 * Scope: Pure types plus the build-history capability guard. Does not contain business logic or perform I/O.
 * Invariants: Hierarchy is fixed at four levels; timestamps are epoch milliseconds; a job is build-producing only if it exposes `buildHistory`.
 * Side-effects: none
 * Links: src/core/activity/people.ts, src/features/views/item-collection-view.ts
 * @public
 */

/** Build outcomes, worst last */
export const BUILD_RESULTS = [
  "SUCCESS",
  "UNSTABLE",
  "FAILURE",
  "NOT_BUILT",
  "ABORTED",
] as const;
export type BuildResult = (typeof BUILD_RESULTS)[number];

/** A person known to the system. Identity is `id`. */
export interface User {
  readonly id: string;
  readonly fullName: string;
}

/** One recorded change in a build's change set */
export interface ChangeEntry {
  /** null when the change could not be attributed */
  readonly author: User | null;
  readonly msg?: string;
  readonly affectedPaths?: readonly string[];
}

/** One historical execution of a job */
export interface Build {
  readonly number: number;
  /** Start time in epoch milliseconds */
  readonly timestamp: number;
  /** null while the build is still running */
  readonly result: BuildResult | null;
  readonly changeSet: readonly ChangeEntry[];
}

/**
 * Capability a job may expose when it keeps a build history.
 * Builds are returned newest-first by convention, but callers must not rely on it.
 */
export interface BuildHistoryProvider {
  getBuilds(): readonly Build[];
}

/** Any item-reachable entity; only some keep builds */
export interface Job {
  readonly name: string;
  readonly buildHistory?: BuildHistoryProvider;
}

/** Top-level named entity owned by an item group */
export interface Item {
  readonly name: string;
  readonly displayName?: string;
  /** Jobs reachable from this item, including the item itself when it is a job */
  getAllJobs(): readonly Job[];
}

export type BuildProducingJob = Job & {
  readonly buildHistory: BuildHistoryProvider;
};

export function hasBuildHistory(job: Job): job is BuildProducingJob {
  return job.buildHistory !== undefined;
}

/** A build together with the job that owns it */
export interface JobRun {
  readonly job: BuildProducingJob;
  readonly build: Build;
}
