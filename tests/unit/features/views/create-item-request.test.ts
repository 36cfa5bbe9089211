// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/views/create-item-request`
 * Purpose: Verifies translation of raw creation requests into item-group parameters.
 * Scope: Contract parsing and name rules combined.
 * Side-effects: none
 * Links: src/features/views/create-item-request.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { ItemValidationError } from "@/core";
import { parseCreateItemRequest } from "@/features/views/public";

function issuesOf(request: unknown): readonly string[] {
  try {
    parseCreateItemRequest(request);
  } catch (error) {
    if (error instanceof ItemValidationError) return error.issues;
    throw error;
  }
  return [];
}

describe("parseCreateItemRequest", () => {
  it("maps a new-item request", () => {
    expect(parseCreateItemRequest({ name: "api", displayName: "API" })).toEqual({
      name: "api",
      displayName: "API",
      description: undefined,
      copyFrom: undefined,
    });
  });

  it("maps a copy request", () => {
    expect(
      parseCreateItemRequest({ name: "api-2", mode: "copy", from: "api" }).copyFrom
    ).toBe("api");
  });

  it("ignores from unless copying", () => {
    expect(
      parseCreateItemRequest({ name: "api-2", from: "api" }).copyFrom
    ).toBeUndefined();
  });

  it("prefixes schema issues with their path", () => {
    expect(issuesOf({ name: "api", mode: "copy" })).toEqual([
      "from: from is required when mode is copy",
    ]);
  });

  it("reports a non-object request without a path", () => {
    expect(issuesOf(null)).toEqual(["Expected object, received null"]);
  });

  it("applies item-name rules after the schema", () => {
    expect(issuesOf({ name: "a/b" })).toEqual([
      'name contains unsafe character "/"',
    ]);
  });
});
