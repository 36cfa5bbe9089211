// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/search-index`
 * Purpose: Registers a view and its items with a composite search index.
 * Scope: Adapts a view's lookup and enumeration to SearchIndex. Does not rank or own the composite structure.
 * Invariants: The contributed index resolves exactly what the view's getItem/getItems resolve, at query time.
 * Side-effects: none (mutates only the builder it is given)
 * @public
 */

import type { Item } from "@/core";
import type { SearchIndex, SearchIndexBuilder } from "@/ports";

/**
 * SearchIndex backed by a lookup and an enumeration, evaluated lazily on each query.
 */
export class CollectionSearchIndex<T extends { readonly name: string }>
  implements SearchIndex<T>
{
  constructor(
    private readonly lookup: (name: string) => T | undefined,
    private readonly enumerate: () => readonly T[]
  ) {}

  find(key: string): T | undefined {
    return this.lookup(key);
  }

  all(): readonly T[] {
    return this.enumerate();
  }

  /** Case-insensitive name prefix match, in enumeration order */
  suggest(prefix: string): T[] {
    const lower = prefix.toLowerCase();
    return this.enumerate().filter((value) =>
      value.name.toLowerCase().startsWith(lower)
    );
  }
}

/** The part of a view the search index needs */
export interface SearchableView {
  getViewName(): string;
  getSearchUrl(): string;
  getItem(name: string): Item | undefined;
  getItems(): readonly Item[];
}

export function contributeViewToSearchIndex(
  view: SearchableView,
  builder: SearchIndexBuilder
): SearchIndexBuilder {
  return builder
    .addEntry({ name: view.getViewName(), url: view.getSearchUrl() })
    .add(
      new CollectionSearchIndex<Item>(
        (name) => view.getItem(name),
        () => view.getItems()
      )
    );
}
