// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/activity/user-info`
 * Purpose: Unit tests for elapsed-time strings and sort keys of activity records.
 * Scope: Pure function testing. Does not read the system clock.
 * Side-effects: none
 * Links: src/core/activity/user-info.ts
 * @public
 */

import { makeJob, makeUser } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { formatTimeSpan, lastChangeTimeString, timeSortKey } from "@/core";

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

describe("core/activity/user-info", () => {
  describe("formatTimeSpan", () => {
    it.each([
      [0, "0 ms"],
      [250, "250 ms"],
      [45 * SECOND, "45 sec"],
      [3 * MINUTE + 7 * SECOND, "3 min 7 sec"],
      [12 * MINUTE + 30 * SECOND, "12 min"],
      [3 * HOUR + 5 * MINUTE, "3 hr 5 min"],
      [12 * HOUR, "12 hr"],
      [DAY, "1 day 0 hr"],
      [2 * DAY + 3 * HOUR, "2 days 3 hr"],
      [40 * DAY, "1 mo 10 days"],
      [400 * DAY, "1 yr 1 mo"],
    ])("formats %i ms as %s", (ms, expected) => {
      expect(formatTimeSpan(ms)).toBe(expected);
    });

    it("clamps negative durations", () => {
      expect(formatTimeSpan(-5000)).toBe("0 ms");
    });
  });

  it("lastChangeTimeString measures from the given time", () => {
    const info = {
      user: makeUser("alice"),
      project: makeJob("J"),
      lastChangeTimestamp: 1_000_000,
    };

    expect(lastChangeTimeString(info, 1_000_000 + 2 * HOUR)).toBe("2 hr 0 min");
  });

  it("timeSortKey is the ISO timestamp", () => {
    const info = {
      user: makeUser("alice"),
      project: makeJob("J"),
      lastChangeTimestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
    };

    expect(timeSortKey(info)).toBe("2024-01-02T03:04:05.000Z");
  });
});
