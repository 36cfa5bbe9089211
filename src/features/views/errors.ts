// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/errors`
 * Purpose: Translate view domain errors into feature-level error shapes.
 * Scope: Provides ViewsFeatureError types and the mapper; does not call ports or adapters.
 * Invariants: Pure functions, no side effects, no I/O.
 * Side-effects: none
 * Notes: Consumed by callers of the view services to surface stable error kinds.
 * Links: src/core/views/errors.ts
 * @public
 */
import {
  aclScopeKey,
  isAccessDeniedError,
  isItemAlreadyExistsError,
  isItemValidationError,
} from "@/core";

export type ViewsFeatureError =
  | {
      kind: "ACCESS_DENIED";
      principalId: string;
      permissionId: string;
      scope: string;
    }
  | { kind: "INVALID_REQUEST"; issues: readonly string[] }
  | { kind: "ITEM_EXISTS"; itemName: string }
  | { kind: "GENERIC"; message?: string };

export function mapViewsErrorToFeature(error: unknown): ViewsFeatureError {
  if (isAccessDeniedError(error)) {
    return {
      kind: "ACCESS_DENIED",
      principalId: error.principalId,
      permissionId: error.permissionId,
      scope: aclScopeKey(error.scope),
    };
  }

  if (isItemValidationError(error)) {
    return { kind: "INVALID_REQUEST", issues: error.issues };
  }

  if (isItemAlreadyExistsError(error)) {
    return { kind: "ITEM_EXISTS", itemName: error.itemName };
  }

  return {
    kind: "GENERIC",
    message: error instanceof Error ? error.message : "Unknown view error",
  };
}
