// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/test/fake-authorization`
 * Purpose: Verifies the configurable authorization fake used across unit tests.
 * Scope: Grant matching and call recording.
 * Side-effects: none
 * Links: src/adapters/test/authorization/fake-authorization.adapter.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { FakeAuthorizationAdapter } from "@/adapters/test";
import {
  authenticatedPrincipal,
  GLOBAL_ACL_SCOPE,
  ITEM_CREATE,
  viewAclScope,
} from "@/core";

const alice = authenticatedPrincipal("alice");

describe("FakeAuthorizationAdapter", () => {
  it("denies by default and records checks", () => {
    const fake = new FakeAuthorizationAdapter();

    expect(fake.hasPermission(alice, ITEM_CREATE, viewAclScope("team"))).toBe(false);
    expect(fake.checks).toEqual([
      { principalId: "alice", permissionId: "Item.Create", scopeKey: "view:team" },
    ]);
  });

  it("honours scoped and unscoped grants", () => {
    const fake = new FakeAuthorizationAdapter().grant(
      "alice",
      ITEM_CREATE,
      viewAclScope("team")
    );

    expect(fake.hasPermission(alice, ITEM_CREATE, viewAclScope("team"))).toBe(true);
    expect(fake.hasPermission(alice, ITEM_CREATE, GLOBAL_ACL_SCOPE)).toBe(false);

    fake.grant("alice", ITEM_CREATE);
    expect(fake.hasPermission(alice, ITEM_CREATE, GLOBAL_ACL_SCOPE)).toBe(true);
  });

  it("can skip recording checks", () => {
    const fake = new FakeAuthorizationAdapter(true, { recordChecks: false });

    fake.hasPermission(alice, ITEM_CREATE, GLOBAL_ACL_SCOPE);

    expect(fake.checks).toEqual([]);
  });

  it("allow-all permits everything", () => {
    const fake = new FakeAuthorizationAdapter(true);
    expect(fake.hasPermission(alice, ITEM_CREATE, GLOBAL_ACL_SCOPE)).toBe(true);
  });
});
