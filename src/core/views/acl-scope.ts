// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/views/acl-scope`
 * Purpose: Authorization scopes and acting principals.
 * Scope: Value types and key derivation. Does not evaluate permissions.
 * Invariants: A view without a dedicated scope uses GLOBAL_ACL_SCOPE explicitly; scope keys are stable strings.
 * Side-effects: none
 * @public
 */

export type AclScope =
  | { readonly kind: "global" }
  | { readonly kind: "view"; readonly viewName: string };

export const GLOBAL_ACL_SCOPE: AclScope = Object.freeze({ kind: "global" });

export function viewAclScope(viewName: string): AclScope {
  return Object.freeze({ kind: "view", viewName });
}

/** "global" or "view:<name>"; used as the key in policy files */
export function aclScopeKey(scope: AclScope): string {
  return scope.kind === "global" ? "global" : `view:${scope.viewName}`;
}

export interface Principal {
  readonly id: string;
  readonly authenticated: boolean;
}

export const ANONYMOUS: Principal = Object.freeze({
  id: "anonymous",
  authenticated: false,
});

export function authenticatedPrincipal(id: string): Principal {
  return Object.freeze({ id, authenticated: true });
}
