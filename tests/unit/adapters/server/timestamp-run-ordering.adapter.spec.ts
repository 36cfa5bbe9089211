// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/timestamp-run-ordering`
 * Purpose: Verifies feed ordering and failure classification.
 * Scope: Pure ordering. Does not collect builds.
 * Side-effects: none
 * Links: src/adapters/server/runs/timestamp-run-ordering.adapter.ts
 * @public
 */

import { makeBuild, makeJob } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { TimestampRunOrdering } from "@/adapters/server";

const ordering = new TimestampRunOrdering();

describe("TimestampRunOrdering", () => {
  it("sorts by timestamp, then build number, then job name", () => {
    const a = makeJob("a");
    const b = makeJob("b");
    const runs = [
      { job: a, build: makeBuild(1, 100) },
      { job: b, build: makeBuild(5, 300) },
      { job: b, build: makeBuild(2, 100) },
      { job: a, build: makeBuild(2, 100) },
    ];

    const sorted = ordering.newestFirst(runs);

    expect(sorted.map((r) => `${r.job.name}#${r.build.number}`)).toEqual([
      "b#5",
      "a#2",
      "b#2",
      "a#1",
    ]);
  });

  it("leaves its input untouched", () => {
    const job = makeJob("a");
    const runs = [
      { job, build: makeBuild(1, 100) },
      { job, build: makeBuild(2, 200) },
    ];

    ordering.newestFirst(runs);

    expect(runs.map((r) => r.build.number)).toEqual([1, 2]);
  });

  it("only FAILURE counts as a failure", () => {
    expect(ordering.isFailure(makeBuild(1, 1, [], "FAILURE"))).toBe(true);
    expect(ordering.isFailure(makeBuild(1, 1, [], "UNSTABLE"))).toBe(false);
    expect(ordering.isFailure(makeBuild(1, 1, [], null))).toBe(false);
  });
});
