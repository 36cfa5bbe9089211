// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/all-view`
 * Purpose: Root view presenting every item of the item group.
 * Scope: Pass-through to ItemGroup. Does not filter.
 * Invariants: getUrl() is always ""; contains every item getItems() of the group returns.
 * Side-effects: none
 * @public
 */

import { type Item, ROOT_VIEW_URL } from "@/core";

import { ItemCollectionView, type ViewDeps } from "./item-collection-view";

export const DEFAULT_ROOT_VIEW_NAME = "All";

export interface AllViewOptions {
  name?: string | undefined;
  description?: string | undefined;
}

export class AllView extends ItemCollectionView {
  private readonly name: string;
  private readonly description: string | null;

  constructor(deps: ViewDeps, options: AllViewOptions = {}) {
    super(deps);
    this.name = options.name ?? DEFAULT_ROOT_VIEW_NAME;
    this.description = options.description ?? null;
  }

  getItems(): readonly Item[] {
    return this.itemGroup.getItems();
  }

  getItem(name: string): Item | undefined {
    return this.itemGroup.getItem(name);
  }

  override contains(item: Item): boolean {
    return this.itemGroup.getItem(item.name) === item;
  }

  getViewName(): string {
    return this.name;
  }

  getDescription(): string | null {
    return this.description;
  }

  getUrl(): string {
    return ROOT_VIEW_URL;
  }
}
