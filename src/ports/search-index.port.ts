// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/search-index`
 * Purpose: Composite search-index structure that views contribute to.
 * Scope: Registration contract only. Does not implement search.
 * Side-effects: none (interface only)
 * @public
 */

/** A single named, navigable search hit */
export interface SearchEntry {
  readonly name: string;
  readonly url: string;
}

/** Name → value lookup a contributor registers */
export interface SearchIndex<T> {
  find(key: string): T | undefined;
  all(): readonly T[];
  suggest(prefix: string): T[];
}

export interface SearchIndexBuilder {
  addEntry(entry: SearchEntry): SearchIndexBuilder;
  add<T>(index: SearchIndex<T>): SearchIndexBuilder;
}
