// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/services/create-item`
 * Purpose: Orchestrates item creation through a view with logging, metrics and stable error kinds.
 * Scope: Calls view.createItem and maps the outcome. Does not resolve principals or sessions.
 * Invariants: Never throws for domain failures; every attempt increments views_item_create_total exactly once.
 * Side-effects: IO (item group write via the view, logging, metrics)
 * Links: src/contracts/views.create-item.v1.contract.ts, src/features/views/errors.ts
 * @public
 */

import type { CreateItemOutput } from "@/contracts/views.create-item.v1.contract";
import { itemUrlInView, type Principal } from "@/core";
import {
  EVENT_NAMES,
  type ItemCreateOutcome,
  type Logger,
  logEvent,
  viewsItemCreateTotal,
} from "@/shared/observability";

import { mapViewsErrorToFeature, type ViewsFeatureError } from "../errors";
import type { ItemCollectionView } from "../item-collection-view";

export interface ServiceContext {
  log: Logger;
  reqId: string;
}

export type CreateItemResult =
  | { ok: true; item: CreateItemOutput }
  | { ok: false; error: ViewsFeatureError };

const OUTCOME_BY_KIND: Record<ViewsFeatureError["kind"], ItemCreateOutcome> = {
  ACCESS_DENIED: "denied",
  INVALID_REQUEST: "invalid",
  ITEM_EXISTS: "exists",
  GENERIC: "error",
};

export async function createItemInView(
  view: ItemCollectionView,
  principal: Principal,
  request: unknown,
  ctx: ServiceContext
): Promise<CreateItemResult> {
  const viewName = view.getViewName();

  try {
    const item = await view.createItem(principal, request);
    viewsItemCreateTotal.inc({ outcome: "created" });
    logEvent(ctx.log, EVENT_NAMES.VIEWS_ITEM_CREATED, {
      reqId: ctx.reqId,
      viewName,
      itemName: item.name,
      principalId: principal.id,
    });
    return {
      ok: true,
      item: { name: item.name, url: itemUrlInView(view.getUrl(), item.name) },
    };
  } catch (error) {
    const featureError = mapViewsErrorToFeature(error);
    viewsItemCreateTotal.inc({ outcome: OUTCOME_BY_KIND[featureError.kind] });

    switch (featureError.kind) {
      case "ACCESS_DENIED":
        logEvent(ctx.log, EVENT_NAMES.VIEWS_ITEM_CREATE_DENIED, {
          reqId: ctx.reqId,
          viewName,
          principalId: featureError.principalId,
          permission: featureError.permissionId,
        });
        break;
      case "INVALID_REQUEST":
      case "ITEM_EXISTS":
        logEvent(ctx.log, EVENT_NAMES.VIEWS_ITEM_CREATE_INVALID, {
          reqId: ctx.reqId,
          viewName,
          errorKind: featureError.kind,
        });
        break;
      case "GENERIC":
        ctx.log.error(
          { event: EVENT_NAMES.VIEWS_ITEM_CREATE_FAILED, reqId: ctx.reqId, viewName, err: error },
          EVENT_NAMES.VIEWS_ITEM_CREATE_FAILED
        );
        break;
    }

    return { ok: false, error: featureError };
  }
}
