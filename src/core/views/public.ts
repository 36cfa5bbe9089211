// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/views/public`
 * Purpose: Public API barrel for the views domain.
 * Scope: Re-exports only. Does not define any logic.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none
 * @public
 */

// Scopes and principals
export {
  type AclScope,
  aclScopeKey,
  ANONYMOUS,
  authenticatedPrincipal,
  GLOBAL_ACL_SCOPE,
  type Principal,
  viewAclScope,
} from "./acl-scope";
// Errors
export {
  AccessDeniedError,
  ItemAlreadyExistsError,
  ItemValidationError,
  isAccessDeniedError,
  isItemAlreadyExistsError,
  isItemValidationError,
} from "./errors";
// Model types
export type {
  Build,
  BuildHistoryProvider,
  BuildProducingJob,
  BuildResult,
  ChangeEntry,
  Item,
  Job,
  JobRun,
  User,
} from "./model";
export { BUILD_RESULTS, hasBuildHistory } from "./model";
// Permissions
export {
  ADMINISTER,
  ALL_PERMISSIONS,
  findPermission,
  ITEM_CREATE,
  ITEM_PERMISSIONS,
  implicationChain,
  type Permission,
  type PermissionGroup,
  READ,
  SYSTEM_PERMISSIONS,
  VIEW_CONFIGURE,
  VIEW_CREATE,
  VIEW_DELETE,
  VIEW_PERMISSIONS,
} from "./permissions";
// Rules
export {
  absoluteViewUrl,
  checkItemName,
  compareViewNames,
  isWellFormedViewUrl,
  itemUrlInView,
  namedViewUrl,
  ROOT_VIEW_URL,
  UNSAFE_NAME_CHARACTERS,
} from "./rules";
