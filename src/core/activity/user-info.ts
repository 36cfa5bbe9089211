// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/activity/user-info`
 * Purpose: Display helpers for activity records: elapsed-time strings and sortable keys.
 * Scope: Pure formatting; callers pass the reference time. Does not read the system clock.
 * Invariants: Spans show at most two units; the second unit is dropped once the first reaches 10.
 * Side-effects: none
 * @public
 */

import type { UserInfo } from "./people";

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const MONTH_MS = 30 * DAY_MS;
const YEAR_MS = 365 * DAY_MS;

function unit(count: number, singular: string, plural: string): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

function span(big: string, bigCount: number, small: string): string {
  return bigCount < 10 ? `${big} ${small}` : big;
}

/**
 * Coarse human-readable duration, e.g. "3 hr 5 min", "2 days 4 hr", "45 sec".
 * Negative durations render as "0 ms".
 */
export function formatTimeSpan(durationMs: number): string {
  const ms = Math.max(0, Math.floor(durationMs));

  const years = Math.floor(ms / YEAR_MS);
  const months = Math.floor((ms % YEAR_MS) / MONTH_MS);
  const days = Math.floor((ms % MONTH_MS) / DAY_MS);
  const hours = Math.floor((ms % DAY_MS) / HOUR_MS);
  const minutes = Math.floor((ms % HOUR_MS) / MINUTE_MS);
  const seconds = Math.floor((ms % MINUTE_MS) / SECOND_MS);

  if (years > 0) {
    return span(unit(years, "yr", "yr"), years, unit(months, "mo", "mo"));
  }
  if (months > 0) {
    return span(unit(months, "mo", "mo"), months, unit(days, "day", "days"));
  }
  if (days > 0) {
    return span(unit(days, "day", "days"), days, unit(hours, "hr", "hr"));
  }
  if (hours > 0) {
    return span(unit(hours, "hr", "hr"), hours, unit(minutes, "min", "min"));
  }
  if (minutes > 0) {
    return span(
      unit(minutes, "min", "min"),
      minutes,
      unit(seconds, "sec", "sec")
    );
  }
  if (seconds > 0) {
    return unit(seconds, "sec", "sec");
  }
  return `${ms} ms`;
}

/**
 * Elapsed time since the user's last change, relative to `nowMs`.
 */
export function lastChangeTimeString(info: UserInfo, nowMs: number): string {
  return formatTimeSpan(nowMs - info.lastChangeTimestamp);
}

/** ISO-8601 timestamp; sorts lexicographically in time order */
export function timeSortKey(info: UserInfo): string {
  return new Date(info.lastChangeTimestamp).toISOString();
}
