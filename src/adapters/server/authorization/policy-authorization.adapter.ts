// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/authorization/policy-authorization`
 * Purpose: AuthorizationPort backed by a static ACL policy (per-scope grant lists).
 * Scope: Resolves grants for a principal in a scope. Does not load or watch the policy file.
 * Invariants:
 * - A permission is held when it, or any permission implying it, is granted.
 * - Grantees: the principal id, "anonymous" (everyone) and "authenticated" (authenticated principals only).
 * - View scopes inherit the global scope's grants.
 * - Unknown permission ids in the policy fail construction.
 * Side-effects: none
 * Links: Implements AuthorizationPort; policy from src/shared/config/aclPolicy.server.ts
 * @internal
 */

import {
  type AclScope,
  aclScopeKey,
  findPermission,
  GLOBAL_ACL_SCOPE,
  implicationChain,
  type Permission,
  type Principal,
} from "@/core";
import type { AuthorizationPort } from "@/ports";
import { type AclPolicy, AclPolicyError } from "@/shared/config";

export const ANONYMOUS_GRANTEE = "anonymous";
export const AUTHENTICATED_GRANTEE = "authenticated";

type ScopeGrants = ReadonlyMap<string, ReadonlySet<string>>;

function compileGrants(policy: AclPolicy): Map<string, ScopeGrants> {
  const compiled = new Map<string, ScopeGrants>();
  for (const [scopeKey, grants] of Object.entries(policy.scopes)) {
    const byGrantee = new Map<string, ReadonlySet<string>>();
    for (const [grantee, permissionIds] of Object.entries(grants)) {
      for (const id of permissionIds) {
        if (!findPermission(id)) {
          throw new AclPolicyError(
            `Unknown permission "${id}" granted to ${grantee} in scope ${scopeKey}`
          );
        }
      }
      byGrantee.set(grantee, new Set(permissionIds));
    }
    compiled.set(scopeKey, byGrantee);
  }
  return compiled;
}

export class PolicyAuthorizationAdapter implements AuthorizationPort {
  private readonly grants: Map<string, ScopeGrants>;

  constructor(policy: AclPolicy) {
    this.grants = compileGrants(policy);
  }

  hasPermission(
    principal: Principal,
    permission: Permission,
    scope: AclScope
  ): boolean {
    const acceptable = implicationChain(permission).map((p) => p.id);
    const scopes =
      scope.kind === "global" ? [scope] : [scope, GLOBAL_ACL_SCOPE];

    return scopes.some((candidate) => {
      const scopeGrants = this.grants.get(aclScopeKey(candidate));
      if (!scopeGrants) return false;
      return this.granteesFor(principal).some((grantee) => {
        const granted = scopeGrants.get(grantee);
        return granted !== undefined && acceptable.some((id) => granted.has(id));
      });
    });
  }

  private granteesFor(principal: Principal): string[] {
    const grantees = [ANONYMOUS_GRANTEE];
    if (principal.authenticated) {
      grantees.push(AUTHENTICATED_GRANTEE, principal.id);
    }
    return grantees;
  }
}
