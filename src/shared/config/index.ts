// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config`
 * Purpose: Public surface for file-based configuration.
 * Scope: Re-exports the ACL policy schema and loader. Does not read env vars.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export {
  ACL_SCOPE_KEY_PATTERN,
  type AclGrants,
  type AclPolicy,
  aclPolicySchema,
} from "./aclPolicy.schema";
export {
  AclPolicyError,
  loadAclPolicy,
  parseAclPolicy,
} from "./aclPolicy.server";
