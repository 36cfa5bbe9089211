// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/aclPolicy.server`
 * Purpose: Server-only loader for the YAML ACL policy file.
 * Scope: Reads, parses and validates the policy. Does not cache or evaluate permissions.
 * Invariants: Returned policy always satisfies aclPolicySchema; every failure surfaces as AclPolicyError.
 * Side-effects: IO (reads policy file from disk in loadAclPolicy)
 * Links: config/acl-policy.yaml
 * @public
 */

import fs from "node:fs";
import path from "node:path";

import { parse } from "yaml";

import { type AclPolicy, aclPolicySchema } from "./aclPolicy.schema";

export class AclPolicyError extends Error {
  constructor(message: string) {
    super(`[acl-policy] ${message}`);
    this.name = "AclPolicyError";
  }
}

export function parseAclPolicy(content: string): AclPolicy {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch {
    throw new AclPolicyError("Failed to parse policy; ensure valid YAML");
  }

  const result = aclPolicySchema.safeParse(raw ?? { scopes: {} });
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new AclPolicyError(`Invalid policy: ${detail}`);
  }
  return result.data;
}

export function loadAclPolicy(policyPath: string): AclPolicy {
  const resolved = path.resolve(process.cwd(), policyPath);

  if (!fs.existsSync(resolved)) {
    throw new AclPolicyError(`Missing policy file at ${resolved}`);
  }

  return parseAclPolicy(fs.readFileSync(resolved, "utf8"));
}
