// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/item-collection-view`
 * Purpose: Base abstraction for named, URL-addressable collections of items, with the behaviour every view shares.
 * Scope: Item lookup, URL/name conventions, permission-guarded item creation, activity index, search contribution and feed export. Does not render, route or persist.
 * Invariants:
 * - getUrl() is "" for the root view and otherwise ends with "/" and never starts with "/".
 * - createItem checks ITEM_CREATE before any validation or mutation.
 * - getPeople() builds a fresh index on every call.
 * Side-effects: IO (createItem delegates to the ItemGroup)
 * Links: src/features/views/all-view.ts, src/features/views/list-view.ts
 * @public
 */

import {
  absoluteViewUrl,
  type AclScope,
  compareViewNames,
  GLOBAL_ACL_SCOPE,
  hasPeople,
  ITEM_CREATE,
  type Item,
  type Permission,
  type Principal,
} from "@/core";
import type {
  AuthorizationPort,
  ItemGroup,
  RunOrdering,
  SearchIndexBuilder,
} from "@/ports";

import { AclGate } from "./acl-gate";
import { parseCreateItemRequest } from "./create-item-request";
import { exportFeed, type Feed, type FeedFilter } from "./feed-exporter";
import { People } from "./people";
import { contributeViewToSearchIndex } from "./search-index";

export interface ViewDeps {
  itemGroup: ItemGroup;
  authorization: AuthorizationPort;
  runOrdering: RunOrdering;
  /** Scope permission checks run in; the global scope when omitted */
  aclScope?: AclScope | undefined;
  /** Root that getAbsoluteUrl() resolves against when no root path is passed */
  rootUrl?: string | undefined;
}

export abstract class ItemCollectionView {
  protected readonly itemGroup: ItemGroup;
  protected readonly runOrdering: RunOrdering;
  private readonly rootUrl: string;
  private readonly gate: AclGate;

  protected constructor(deps: ViewDeps) {
    this.itemGroup = deps.itemGroup;
    this.runOrdering = deps.runOrdering;
    this.rootUrl = deps.rootUrl ?? "";
    this.gate = new AclGate(
      deps.authorization,
      deps.aclScope ?? GLOBAL_ACL_SCOPE
    );
  }

  /** Snapshot of the items this view presents */
  abstract getItems(): readonly Item[];

  /**
   * Item of this view with the given name.
   * @returns undefined when no such item is visible through the view
   */
  abstract getItem(name: string): Item | undefined;

  abstract getViewName(): string;

  abstract getDescription(): string | null;

  /** Relative URL of this view, e.g. `view/team/`; "" for the root view */
  abstract getUrl(): string;

  contains(item: Item): boolean {
    return this.getItems().includes(item);
  }

  getDisplayName(): string {
    return this.getViewName();
  }

  getSearchUrl(): string {
    return this.getUrl();
  }

  getAbsoluteUrl(rootPath: string = this.rootUrl): string {
    return absoluteViewUrl(rootPath, this.getUrl());
  }

  getAclGate(): AclGate {
    return this.gate;
  }

  hasPermission(principal: Principal, permission: Permission): boolean {
    return this.gate.hasPermission(principal, permission);
  }

  /**
   * @throws AccessDeniedError when the principal lacks `permission` in this view's scope
   */
  checkPermission(principal: Principal, permission: Permission): void {
    this.gate.checkPermission(principal, permission);
  }

  /**
   * Create a new item on behalf of `principal` and make it part of this view.
   * @throws AccessDeniedError before anything else when ITEM_CREATE is missing
   * @throws ItemValidationError for malformed requests
   * @throws ItemAlreadyExistsError when the name is taken
   */
  async createItem(principal: Principal, request: unknown): Promise<Item> {
    this.checkPermission(principal, ITEM_CREATE);

    const params = parseCreateItemRequest(request);
    const item = await this.itemGroup.createItem(params);
    this.onItemCreated(item);
    return item;
  }

  /** Called after the item group accepted a new item created through this view */
  protected onItemCreated(_item: Item): void {}

  getPeople(): People<this> {
    return new People(this);
  }

  hasPeople(): boolean {
    return hasPeople(this.getItems());
  }

  makeSearchIndex(builder: SearchIndexBuilder): SearchIndexBuilder {
    return contributeViewToSearchIndex(this, builder);
  }

  getFeed(filter: FeedFilter): Feed {
    return exportFeed(this, filter, this.runOrdering);
  }
}

/** Sibling views sort by view name */
export function compareViews(
  lhs: ItemCollectionView,
  rhs: ItemCollectionView
): number {
  return compareViewNames(lhs.getViewName(), rhs.getViewName());
}
