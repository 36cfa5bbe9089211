// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/activity/public`
 * Purpose: Public API barrel for the contributor activity domain.
 * Scope: Re-exports only. Does not define any logic.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none
 * @public
 */

export {
  buildActivityIndex,
  compareByLastChangeDesc,
  hasPeople,
  type UserInfo,
} from "./people";
export {
  formatTimeSpan,
  lastChangeTimeString,
  timeSortKey,
} from "./user-info";
