// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/views/permissions`
 * Purpose: Unit tests for the permission catalogue, implication chains and ACL scopes.
 * Scope: Pure value testing. Does not test authorization adapters.
 * Side-effects: none
 * Links: src/core/views/permissions.ts, src/core/views/acl-scope.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  ADMINISTER,
  ALL_PERMISSIONS,
  ANONYMOUS,
  aclScopeKey,
  authenticatedPrincipal,
  findPermission,
  GLOBAL_ACL_SCOPE,
  ITEM_CREATE,
  implicationChain,
  READ,
  VIEW_CONFIGURE,
  VIEW_CREATE,
  VIEW_DELETE,
  VIEW_PERMISSIONS,
  viewAclScope,
} from "@/core";

describe("core/views/permissions", () => {
  it("ids are <group>.<name>", () => {
    expect(ITEM_CREATE.id).toBe("Item.Create");
    expect(ADMINISTER.id).toBe("System.Administer");
  });

  it("view permissions belong to the View group", () => {
    expect([VIEW_CREATE, VIEW_DELETE, VIEW_CONFIGURE].map((p) => p.id)).toEqual([
      "View.Create",
      "View.Delete",
      "View.Configure",
    ]);
    for (const permission of [VIEW_CREATE, VIEW_DELETE, VIEW_CONFIGURE]) {
      expect(permission.group).toBe(VIEW_PERMISSIONS);
      expect(permission.impliedBy).toBe(ADMINISTER);
    }
  });

  it("ids are unique", () => {
    const ids = ALL_PERMISSIONS.map((p) => p.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("findPermission resolves known ids only", () => {
    expect(findPermission("System.Read")).toBe(READ);
    expect(findPermission("System.Nope")).toBeUndefined();
  });

  it("every permission except Administer is implied by Administer", () => {
    for (const permission of ALL_PERMISSIONS) {
      const chain = implicationChain(permission);
      expect(chain[0]).toBe(permission);
      expect(chain[chain.length - 1]).toBe(ADMINISTER);
    }
    expect(implicationChain(ADMINISTER)).toEqual([ADMINISTER]);
  });
});

describe("core/views/acl-scope", () => {
  it("keys scopes the way policy files name them", () => {
    expect(aclScopeKey(GLOBAL_ACL_SCOPE)).toBe("global");
    expect(aclScopeKey(viewAclScope("team"))).toBe("view:team");
  });

  it("distinguishes anonymous from authenticated principals", () => {
    expect(ANONYMOUS.authenticated).toBe(false);
    expect(authenticatedPrincipal("alice")).toEqual({
      id: "alice",
      authenticated: true,
    });
  });
});
