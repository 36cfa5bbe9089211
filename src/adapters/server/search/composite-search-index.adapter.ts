// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/search/composite-search-index`
 * Purpose: In-process composite search structure that views and other contributors register with.
 * Scope: Holds named entries and delegating indices; answers exact lookups and prefix suggestions. Does not rank results.
 * Invariants: Entries are matched before indices; indices are consulted in registration order.
 * Side-effects: none
 * Links: Implements SearchIndexBuilder
 * @internal
 */

import type { SearchEntry, SearchIndex, SearchIndexBuilder } from "@/ports";

export class CompositeSearchIndex implements SearchIndexBuilder {
  private readonly entries: SearchEntry[] = [];
  private readonly indices: SearchIndex<unknown>[] = [];

  addEntry(entry: SearchEntry): SearchIndexBuilder {
    this.entries.push(entry);
    return this;
  }

  add<T>(index: SearchIndex<T>): SearchIndexBuilder {
    this.indices.push(index);
    return this;
  }

  find(key: string): unknown {
    const entry = this.entries.find((e) => e.name === key);
    if (entry) return entry;
    for (const index of this.indices) {
      const hit = index.find(key);
      if (hit !== undefined) return hit;
    }
    return undefined;
  }

  suggest(prefix: string): unknown[] {
    const lower = prefix.toLowerCase();
    return [
      ...this.entries.filter((e) => e.name.toLowerCase().startsWith(lower)),
      ...this.indices.flatMap((index) => index.suggest(prefix)),
    ];
  }
}
