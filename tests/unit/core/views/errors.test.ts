// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/views/errors`
 * Purpose: Unit tests for view domain errors and their guards.
 * Scope: Error construction and narrowing. Does not test feature mapping.
 * Side-effects: none
 * Links: src/core/views/errors.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  AccessDeniedError,
  isAccessDeniedError,
  isItemAlreadyExistsError,
  isItemValidationError,
  ItemAlreadyExistsError,
  ItemValidationError,
  viewAclScope,
} from "@/core";

describe("core/views/errors", () => {
  it("AccessDeniedError names principal, permission and scope", () => {
    const error = new AccessDeniedError("bob", "Item.Create", viewAclScope("team"));

    expect(error.message).toBe(
      "bob is missing the Item.Create permission (scope: view:team)"
    );
    expect(error.code).toBe("ACCESS_DENIED");
    expect(isAccessDeniedError(error)).toBe(true);
    expect(isItemValidationError(error)).toBe(false);
  });

  it("ItemValidationError joins its issues", () => {
    const error = new ItemValidationError(["a", "b"]);

    expect(error.message).toBe("Invalid item request: a; b");
    expect(isItemValidationError(error)).toBe(true);
  });

  it("ItemAlreadyExistsError carries the name", () => {
    const error = new ItemAlreadyExistsError("api");

    expect(error.message).toBe("An item named api already exists");
    expect(isItemAlreadyExistsError(error)).toBe(true);
    expect(isItemAlreadyExistsError(new Error("x"))).toBe(false);
  });
});
