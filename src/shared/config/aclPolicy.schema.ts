// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/aclPolicy.schema`
 * Purpose: Zod schema and derived types for the ACL policy file.
 * Scope: Validates structure at runtime. Does not perform I/O or resolve permission ids.
 * Invariants: Scope keys are "global" or "view:<name>"; grantees are principal ids or the "anonymous" / "authenticated" pseudo-principals.
 * Side-effects: none
 * Links: config/acl-policy.yaml, src/adapters/server/authorization/policy-authorization.adapter.ts
 * @public
 */

import { z } from "zod";

export const ACL_SCOPE_KEY_PATTERN = /^(global|view:.+)$/;

/** Grantee → permission ids */
export const aclGrantsSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1))
);

export const aclPolicySchema = z.object({
  scopes: z.record(
    z
      .string()
      .regex(ACL_SCOPE_KEY_PATTERN, 'scope keys must be "global" or "view:<name>"'),
    aclGrantsSchema
  ),
});

export type AclGrants = z.infer<typeof aclGrantsSchema>;
export type AclPolicy = z.infer<typeof aclPolicySchema>;
