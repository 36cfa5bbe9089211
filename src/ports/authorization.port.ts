// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/authorization`
 * Purpose: Authorization engine port — a single check per (principal, permission, scope).
 * Scope: Boolean decision only. Does not throw for denials or choose fallback scopes.
 * Invariants: Pure query; no observable effect.
 * Side-effects: none (interface only)
 * Links: src/features/views/acl-gate.ts
 * @public
 */

import type { AclScope, Permission, Principal } from "@/core";

export interface AuthorizationPort {
  hasPermission(
    principal: Principal,
    permission: Permission,
    scope: AclScope
  ): boolean;
}
