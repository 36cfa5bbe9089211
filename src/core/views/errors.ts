// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/views/errors`
 * Purpose: Domain errors raised by view mutation paths.
 * Scope: Error definitions and type guards. Does not handle HTTP status codes.
 * Invariants: All errors have a readonly `code` discriminant; unknown item names are never errors (absence instead).
 * Side-effects: none
 * Links: src/features/views/errors.ts
 * @public
 */

import { type AclScope, aclScopeKey } from "./acl-scope";

/**
 * Thrown when the acting principal lacks the permission being checked
 */
export class AccessDeniedError extends Error {
  public readonly code = "ACCESS_DENIED" as const;

  constructor(
    public readonly principalId: string,
    public readonly permissionId: string,
    public readonly scope: AclScope
  ) {
    super(
      `${principalId} is missing the ${permissionId} permission (scope: ${aclScopeKey(scope)})`
    );
    this.name = "AccessDeniedError";
  }
}

/**
 * Thrown when an item-creation request is malformed
 */
export class ItemValidationError extends Error {
  public readonly code = "INVALID_ITEM_REQUEST" as const;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid item request: ${issues.join("; ")}`);
    this.name = "ItemValidationError";
  }
}

export class ItemAlreadyExistsError extends Error {
  public readonly code = "ITEM_ALREADY_EXISTS" as const;

  constructor(public readonly itemName: string) {
    super(`An item named ${itemName} already exists`);
    this.name = "ItemAlreadyExistsError";
  }
}

// Type guards

export function isAccessDeniedError(
  error: unknown
): error is AccessDeniedError {
  return error instanceof Error && error.name === "AccessDeniedError";
}

export function isItemValidationError(
  error: unknown
): error is ItemValidationError {
  return error instanceof Error && error.name === "ItemValidationError";
}

export function isItemAlreadyExistsError(
  error: unknown
): error is ItemAlreadyExistsError {
  return error instanceof Error && error.name === "ItemAlreadyExistsError";
}
