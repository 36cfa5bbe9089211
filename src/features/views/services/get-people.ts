// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/services/get-people`
 * Purpose: Exports a view's contributor activity index in its contract shape.
 * Scope: Builds the index via view.getPeople(), times the scan and formats elapsed times against the Clock. Does not cache.
 * Invariants: Output order equals the activity index order (newest change first).
 * Side-effects: global (histogram observation), IO (logging)
 * Links: src/contracts/views.people.v1.contract.ts
 * @public
 */

import type { ViewPeopleOutput } from "@/contracts/views.people.v1.contract";
import { lastChangeTimeString, timeSortKey } from "@/core";
import type { Clock } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  viewsPeopleScanDurationMs,
} from "@/shared/observability";

import type { ItemCollectionView } from "../item-collection-view";
import type { ServiceContext } from "./create-item";

export interface GetPeopleContext extends ServiceContext {
  clock: Clock;
}

export function getViewPeople(
  view: ItemCollectionView,
  ctx: GetPeopleContext
): ViewPeopleOutput {
  const startedAt = performance.now();
  const people = view.getPeople();
  const durationMs = performance.now() - startedAt;
  viewsPeopleScanDurationMs.observe(durationMs);

  const nowMs = Date.parse(ctx.clock.now());

  logEvent(ctx.log, EVENT_NAMES.VIEWS_PEOPLE_SCANNED, {
    reqId: ctx.reqId,
    viewName: view.getViewName(),
    userCount: people.users.length,
    durationMs,
  });

  return {
    view: { name: view.getViewName(), url: view.getUrl() },
    users: people.users.map((info) => ({
      userId: info.user.id,
      fullName: info.user.fullName,
      projectName: info.project.name,
      lastChange: timeSortKey(info),
      lastChangeTimeString: lastChangeTimeString(info, nowMs),
    })),
  };
}
