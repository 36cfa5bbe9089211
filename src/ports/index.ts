// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { AuthorizationPort } from "./authorization.port";
export type { Clock } from "./clock.port";
export type { CreateItemParams, ItemGroup } from "./item-group.port";
export type { RunOrdering } from "./run-ordering.port";
export type {
  SearchEntry,
  SearchIndex,
  SearchIndexBuilder,
} from "./search-index.port";
