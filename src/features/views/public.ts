// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/public`
 * Purpose: Public API for the views feature.
 * Scope: Re-exports view classes, services and error mapping. Does not export internal helpers.
 * Invariants: Named exports only.
 * Side-effects: none
 * @public
 */

export { AclGate } from "./acl-gate";
export {
  AllView,
  type AllViewOptions,
  DEFAULT_ROOT_VIEW_NAME,
} from "./all-view";
export { parseCreateItemRequest } from "./create-item-request";
export { mapViewsErrorToFeature, type ViewsFeatureError } from "./errors";
export {
  exportFeed,
  type Feed,
  type FeedFilter,
  type FeedSource,
  toFeedOutput,
} from "./feed-exporter";
export {
  compareViews,
  ItemCollectionView,
  type ViewDeps,
} from "./item-collection-view";
export { ListView, type ListViewOptions } from "./list-view";
export { People, type PeopleSource } from "./people";
export {
  CollectionSearchIndex,
  contributeViewToSearchIndex,
  type SearchableView,
} from "./search-index";
export {
  type CreateItemResult,
  createItemInView,
  type ServiceContext,
} from "./services/create-item";
export { getViewFeed } from "./services/get-feed";
export { type GetPeopleContext, getViewPeople } from "./services/get-people";
