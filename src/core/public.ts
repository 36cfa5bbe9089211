// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features, ports and adapters via \@/core alias
 * @public
 */

export {
  buildActivityIndex,
  compareByLastChangeDesc,
  formatTimeSpan,
  hasPeople,
  lastChangeTimeString,
  timeSortKey,
  type UserInfo,
} from "./activity/public";
export {
  AccessDeniedError,
  type AclScope,
  ADMINISTER,
  ALL_PERMISSIONS,
  ANONYMOUS,
  absoluteViewUrl,
  aclScopeKey,
  authenticatedPrincipal,
  BUILD_RESULTS,
  type Build,
  type BuildHistoryProvider,
  type BuildProducingJob,
  type BuildResult,
  type ChangeEntry,
  checkItemName,
  compareViewNames,
  findPermission,
  GLOBAL_ACL_SCOPE,
  hasBuildHistory,
  ITEM_CREATE,
  ITEM_PERMISSIONS,
  type Item,
  ItemAlreadyExistsError,
  ItemValidationError,
  implicationChain,
  isAccessDeniedError,
  isItemAlreadyExistsError,
  isItemValidationError,
  isWellFormedViewUrl,
  itemUrlInView,
  type Job,
  type JobRun,
  namedViewUrl,
  type Permission,
  type PermissionGroup,
  type Principal,
  READ,
  ROOT_VIEW_URL,
  SYSTEM_PERMISSIONS,
  UNSAFE_NAME_CHARACTERS,
  type User,
  VIEW_CONFIGURE,
  VIEW_CREATE,
  VIEW_DELETE,
  VIEW_PERMISSIONS,
  viewAclScope,
} from "./views/public";
