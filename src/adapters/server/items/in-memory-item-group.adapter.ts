// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/items/in-memory-item-group`
 * Purpose: Process-local ItemGroup holding freestyle jobs (items that are their own single job).
 * Scope: Name-keyed storage, creation and build recording. Does not persist anything across restarts.
 * Invariants: Item names are unique; getItems returns a frozen snapshot in insertion order; copied items never inherit builds.
 * Side-effects: none (in-process state only)
 * Notes: Embedding applications with a real record store supply their own ItemGroup to the container.
 * Links: Implements ItemGroup
 * @internal
 */

import {
  type Build,
  type BuildHistoryProvider,
  type Item,
  ItemAlreadyExistsError,
  ItemValidationError,
  type Job,
} from "@/core";
import type { CreateItemParams, ItemGroup } from "@/ports";

export interface FreestyleJobOptions {
  displayName?: string | undefined;
  description?: string | undefined;
}

/**
 * A top-level item that is itself a build-producing job.
 */
export class FreestyleJob implements Item, Job {
  readonly displayName: string | undefined;
  readonly description: string | undefined;
  private readonly builds: Build[] = [];

  readonly buildHistory: BuildHistoryProvider = {
    getBuilds: () => [...this.builds],
  };

  constructor(
    readonly name: string,
    options: FreestyleJobOptions = {}
  ) {
    this.displayName = options.displayName;
    this.description = options.description;
  }

  getAllJobs(): readonly Job[] {
    return [this];
  }

  /** Builds are kept newest first */
  recordBuild(build: Build): void {
    this.builds.unshift(build);
  }
}

export class InMemoryItemGroup implements ItemGroup {
  private readonly items = new Map<string, Item>();

  constructor(items: Iterable<Item> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  getItems(): readonly Item[] {
    return Object.freeze([...this.items.values()]);
  }

  getItem(name: string): Item | undefined {
    return this.items.get(name);
  }

  add(item: Item): void {
    if (this.items.has(item.name)) {
      throw new ItemAlreadyExistsError(item.name);
    }
    this.items.set(item.name, item);
  }

  async createItem(params: CreateItemParams): Promise<Item> {
    if (this.items.has(params.name)) {
      throw new ItemAlreadyExistsError(params.name);
    }

    let source: Item | undefined;
    if (params.copyFrom !== undefined) {
      source = this.items.get(params.copyFrom);
      if (!source) {
        throw new ItemValidationError([
          `no item named ${params.copyFrom} to copy from`,
        ]);
      }
    }

    const item = new FreestyleJob(params.name, {
      displayName: params.displayName ?? source?.displayName,
      description:
        params.description ??
        (source instanceof FreestyleJob ? source.description : undefined),
    });
    this.items.set(item.name, item);
    return item;
  }
}
