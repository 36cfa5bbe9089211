// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/composite-search-index`
 * Purpose: Verifies lookup precedence and suggestions of the composite search index.
 * Scope: In-process index only.
 * Side-effects: none
 * Links: src/adapters/server/search/composite-search-index.adapter.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { CompositeSearchIndex } from "@/adapters/server";
import type { SearchIndex } from "@/ports";

function fixedIndex(names: string[]): SearchIndex<{ name: string }> {
  const values = names.map((name) => ({ name }));
  return {
    find: (key) => values.find((v) => v.name === key),
    all: () => values,
    suggest: (prefix) => values.filter((v) => v.name.startsWith(prefix)),
  };
}

describe("CompositeSearchIndex", () => {
  it("prefers entries over indices", () => {
    const index = new CompositeSearchIndex();
    index.add(fixedIndex(["team"])).addEntry({ name: "team", url: "view/team/" });

    expect(index.find("team")).toEqual({ name: "team", url: "view/team/" });
  });

  it("consults indices in registration order", () => {
    const index = new CompositeSearchIndex();
    const first = fixedIndex(["api"]);
    index.add(first).add(fixedIndex(["api"]));

    expect(index.find("api")).toBe(first.find("api"));
    expect(index.find("nothing")).toBeUndefined();
  });

  it("suggests entries first, then index hits", () => {
    const index = new CompositeSearchIndex();
    index
      .addEntry({ name: "Api view", url: "view/Api%20view/" })
      .add(fixedIndex(["api", "web"]));

    expect(index.suggest("api")).toEqual([
      { name: "Api view", url: "view/Api%20view/" },
      { name: "api" },
    ]);
  });
});
