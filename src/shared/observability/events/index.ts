// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by feature services and adapters.
 * @public
 */

export const EVENT_NAMES = {
  // Views Domain
  VIEWS_ITEM_CREATED: "views.item_created",
  VIEWS_ITEM_CREATE_DENIED: "views.item_create_denied",
  VIEWS_ITEM_CREATE_INVALID: "views.item_create_invalid",
  VIEWS_ITEM_CREATE_FAILED: "views.item_create_failed",
  VIEWS_PEOPLE_SCANNED: "views.people_scanned",
  VIEWS_FEED_EXPORTED: "views.feed_exported",

  // Adapter Events
  ADAPTER_ACL_POLICY_LOADED: "adapter.acl_policy.loaded",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 */
export interface EventBase {
  reqId: string;
  viewName?: string;
}
