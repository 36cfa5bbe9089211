// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/people`
 * Purpose: The contributor activity index of one view, bound to the view it came from.
 * Scope: Snapshot of buildActivityIndex over view.getItems() at construction. Does not refresh or cache.
 * Invariants: Immutable after construction; a new People is built on every view.getPeople() call.
 * Side-effects: none
 * Links: src/core/activity/people.ts
 * @public
 */

import { buildActivityIndex, type Item, type UserInfo } from "@/core";

/** The part of a view People reads */
export interface PeopleSource {
  getItems(): readonly Item[];
  getViewName(): string;
  getUrl(): string;
}

export class People<V extends PeopleSource = PeopleSource> {
  readonly users: readonly UserInfo[];

  constructor(readonly view: V) {
    this.users = buildActivityIndex(view.getItems());
  }

  isEmpty(): boolean {
    return this.users.length === 0;
  }
}
