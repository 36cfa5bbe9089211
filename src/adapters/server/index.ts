// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Barrel exports for server adapter implementations.
 * Scope: Re-exports adapters for clean imports. Does not contain logic.
 * Invariants: Every export implements a port from @/ports.
 * Side-effects: none
 * Links: Used by src/bootstrap/container.ts
 * @public
 */

export {
  ANONYMOUS_GRANTEE,
  AUTHENTICATED_GRANTEE,
  PolicyAuthorizationAdapter,
} from "./authorization/policy-authorization.adapter";
export {
  FreestyleJob,
  type FreestyleJobOptions,
  InMemoryItemGroup,
} from "./items/in-memory-item-group.adapter";
export { TimestampRunOrdering } from "./runs/timestamp-run-ordering.adapter";
export { CompositeSearchIndex } from "./search/composite-search-index.adapter";
export { SystemClock } from "./time/system.adapter";
