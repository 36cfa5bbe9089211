// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for "last active" displays on activity records.
 * Scope: Current time as ISO 8601. Does not format durations.
 * Side-effects: none (interface only)
 * Links: src/adapters/server/time/system.adapter.ts, tests/_fakes/fake-clock.ts
 * @public
 */

export interface Clock {
  /** Current time, ISO 8601 */
  now(): string;
}
