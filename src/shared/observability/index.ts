// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events, logging, metrics.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap, features or ports.
 * Side-effects: none
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export { logEvent } from "./logEvent";
export type { Logger } from "./logging";
export { makeLogger, makeNoopLogger, REDACT_PATHS } from "./logging";
export {
  ITEM_CREATE_OUTCOMES,
  type ItemCreateOutcome,
  metricsRegistry,
  viewsItemCreateTotal,
  viewsPeopleScanDurationMs,
  viewsPermissionDeniedTotal,
} from "./metrics";
