// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/create-item-request`
 * Purpose: Turns raw item-creation input into validated ItemGroup parameters.
 * Scope: Contract parsing plus item-name rules. Does not check permissions or touch the item group.
 * Invariants: Every rejection is an ItemValidationError listing all issues found.
 * Side-effects: none
 * Links: src/contracts/views.create-item.v1.contract.ts, src/core/views/rules.ts
 * @public
 */

import { CreateItemInputSchema } from "@/contracts/views.create-item.v1.contract";
import { checkItemName, ItemValidationError } from "@/core";
import type { CreateItemParams } from "@/ports";

export function parseCreateItemRequest(request: unknown): CreateItemParams {
  const parsed = CreateItemInputSchema.safeParse(request);
  if (!parsed.success) {
    throw new ItemValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      )
    );
  }

  const input = parsed.data;
  const nameIssues = checkItemName(input.name);
  if (nameIssues.length > 0) {
    throw new ItemValidationError(nameIssues);
  }

  return {
    name: input.name,
    displayName: input.displayName,
    description: input.description,
    copyFrom: input.mode === "copy" ? input.from : undefined,
  };
}
