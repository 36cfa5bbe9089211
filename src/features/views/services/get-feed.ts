// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/services/get-feed`
 * Purpose: Exports a view's build feed in its contract shape.
 * Scope: Runs view.getFeed and maps it. Does not render RSS/Atom.
 * Side-effects: IO (logging)
 * Links: src/contracts/views.feed.v1.contract.ts
 * @public
 */

import type { FeedFilter, ViewFeedOutput } from "@/contracts/views.feed.v1.contract";
import { EVENT_NAMES, logEvent } from "@/shared/observability";

import { toFeedOutput } from "../feed-exporter";
import type { ItemCollectionView } from "../item-collection-view";
import type { ServiceContext } from "./create-item";

export function getViewFeed(
  view: ItemCollectionView,
  filter: FeedFilter,
  ctx: ServiceContext
): ViewFeedOutput {
  const output = toFeedOutput(view.getFeed(filter));

  logEvent(ctx.log, EVENT_NAMES.VIEWS_FEED_EXPORTED, {
    reqId: ctx.reqId,
    viewName: view.getViewName(),
    filter,
    buildCount: output.builds.length,
  });

  return output;
}
