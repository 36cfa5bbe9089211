// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/list-view`
 * Purpose: Named view over an explicit member list, optionally widened by a name pattern.
 * Scope: Membership bookkeeping and filtering of the item group. Does not persist membership.
 * Invariants:
 * - Items appear in item-group order, never duplicated.
 * - Member names whose item no longer exists are ignored, not errors.
 * - Items created through this view become members.
 * Side-effects: none
 * @public
 */

import { type Item, namedViewUrl } from "@/core";

import { ItemCollectionView, type ViewDeps } from "./item-collection-view";

export interface ListViewOptions {
  description?: string | undefined;
  /** Initial member item names */
  members?: Iterable<string> | undefined;
  /** Items whose full name matches are members too */
  includePattern?: RegExp | undefined;
}

export class ListView extends ItemCollectionView {
  private readonly members: Set<string>;
  private readonly description: string | null;
  private readonly includePattern: RegExp | undefined;

  constructor(
    deps: ViewDeps,
    private readonly name: string,
    options: ListViewOptions = {}
  ) {
    super(deps);
    if (name.length === 0) {
      throw new RangeError("view name must not be empty");
    }
    this.members = new Set(options.members ?? []);
    this.description = options.description ?? null;
    this.includePattern =
      options.includePattern && anchored(options.includePattern);
  }

  private isMember(name: string): boolean {
    if (this.members.has(name)) return true;
    return this.includePattern !== undefined && this.includePattern.test(name);
  }

  getItems(): readonly Item[] {
    return Object.freeze(
      this.itemGroup.getItems().filter((item) => this.isMember(item.name))
    );
  }

  getItem(name: string): Item | undefined {
    if (!this.isMember(name)) return undefined;
    return this.itemGroup.getItem(name);
  }

  override contains(item: Item): boolean {
    return this.isMember(item.name) && this.itemGroup.getItem(item.name) === item;
  }

  getViewName(): string {
    return this.name;
  }

  getDescription(): string | null {
    return this.description;
  }

  getUrl(): string {
    return namedViewUrl(this.name);
  }

  addMember(name: string): void {
    this.members.add(name);
  }

  removeMember(name: string): boolean {
    return this.members.delete(name);
  }

  getMemberNames(): readonly string[] {
    return [...this.members].sort();
  }

  protected override onItemCreated(item: Item): void {
    this.addMember(item.name);
  }
}

/** Whole-name match; stateful flags are dropped so test() never depends on lastIndex */
function anchored(pattern: RegExp): RegExp {
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ""));
}
