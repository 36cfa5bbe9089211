// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/item-group`
 * Purpose: Record-store port for top-level items that views present.
 * Scope: Read snapshot, name lookup and creation contract. Does not contain implementations.
 * Invariants: getItems returns a snapshot; getItem returns undefined for unknown names (never throws); names are unique.
 * Side-effects: none (interface only)
 * Links: Implemented by adapters, used by features/views
 * @public
 */

import type { Item } from "@/core";

export interface CreateItemParams {
  readonly name: string;
  readonly displayName?: string | undefined;
  readonly description?: string | undefined;
  /** Name of an existing item to copy configuration from */
  readonly copyFrom?: string | undefined;
}

export interface ItemGroup {
  getItems(): readonly Item[];
  getItem(name: string): Item | undefined;
  /**
   * Persist a new item.
   * @throws ItemAlreadyExistsError when the name is taken
   * @throws ItemValidationError when copyFrom names an unknown item
   */
  createItem(params: CreateItemParams): Promise<Item>;
}
