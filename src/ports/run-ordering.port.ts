// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/run-ordering`
 * Purpose: Ordering and outcome classification of builds for feeds.
 * Scope: Sorting and failure classification contract. Does not collect builds.
 * Invariants: newestFirst returns a new array and leaves its input untouched.
 * Side-effects: none (interface only)
 * Links: src/features/views/feed-exporter.ts
 * @public
 */

import type { Build, JobRun } from "@/core";

export interface RunOrdering {
  newestFirst(runs: readonly JobRun[]): JobRun[];
  isFailure(build: Build): boolean;
}
