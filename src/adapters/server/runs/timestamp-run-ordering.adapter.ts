// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/runs/timestamp-run-ordering`
 * Purpose: Default RunOrdering — newest build timestamp first, FAILURE counts as failed.
 * Scope: Sorting and classification. Does not collect builds.
 * Invariants: Ties on timestamp fall back to build number descending, then job name ascending.
 * Side-effects: none
 * Links: Implements RunOrdering
 * @internal
 */

import type { Build, JobRun } from "@/core";
import type { RunOrdering } from "@/ports";

export class TimestampRunOrdering implements RunOrdering {
  newestFirst(runs: readonly JobRun[]): JobRun[] {
    return [...runs].sort((a, b) => {
      if (a.build.timestamp !== b.build.timestamp) {
        return b.build.timestamp - a.build.timestamp;
      }
      if (a.build.number !== b.build.number) {
        return b.build.number - a.build.number;
      }
      return a.job.name.localeCompare(b.job.name);
    });
  }

  isFailure(build: Build): boolean {
    return build.result === "FAILURE";
  }
}
