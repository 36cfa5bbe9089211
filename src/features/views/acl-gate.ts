// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/acl-gate`
 * Purpose: Wraps a single authorization check around view operations.
 * Scope: Delegates to AuthorizationPort in the injected scope. Does not choose scopes or cache decisions.
 * Invariants: checkPermission throws AccessDeniedError on denial and has no observable effect on success.
 * Side-effects: global (increments views_permission_denied_total on denial)
 * Links: src/features/views/item-collection-view.ts
 * @public
 */

import {
  AccessDeniedError,
  type AclScope,
  GLOBAL_ACL_SCOPE,
  type Permission,
  type Principal,
} from "@/core";
import type { AuthorizationPort } from "@/ports";
import { viewsPermissionDeniedTotal } from "@/shared/observability";

export class AclGate {
  constructor(
    private readonly authorization: AuthorizationPort,
    readonly scope: AclScope = GLOBAL_ACL_SCOPE
  ) {}

  hasPermission(principal: Principal, permission: Permission): boolean {
    return this.authorization.hasPermission(principal, permission, this.scope);
  }

  /**
   * @throws AccessDeniedError when the principal lacks `permission`
   */
  checkPermission(principal: Principal, permission: Permission): void {
    if (this.hasPermission(principal, permission)) return;

    viewsPermissionDeniedTotal.inc({ permission: permission.id });
    throw new AccessDeniedError(principal.id, permission.id, this.scope);
  }
}
