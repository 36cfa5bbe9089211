// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/views.create-item.v1.contract`
 * Purpose: Defines operation contract for creating an item through a view.
 * Scope: Provides Zod schema and types for item creation wire format. Does not contain business logic.
 * Invariants:
 *   - Contract remains stable; breaking changes require new version
 *   - All consumers use z.infer types
 *   - mode "copy" requires `from`
 * Side-effects: none
 * Links: src/features/views/services/create-item.ts
 * @internal
 */

import { z } from "zod";

export const ITEM_NAME_MAX_LENGTH = 255;

export const CreateItemInputSchema = z
  .object({
    name: z.string().min(1, "name is required").max(ITEM_NAME_MAX_LENGTH),
    displayName: z.string().min(1).optional(),
    description: z.string().optional(),
    /** "new" creates an empty item; "copy" copies configuration from `from` */
    mode: z.enum(["new", "copy"]).default("new"),
    from: z.string().min(1).optional(),
  })
  .superRefine((input, ctx) => {
    if (input.mode === "copy" && input.from === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["from"],
        message: "from is required when mode is copy",
      });
    }
  });

export const CreateItemOutputSchema = z.object({
  name: z.string(),
  url: z.string(),
});

export const viewsCreateItemOperation = {
  id: "views.create-item.v1",
  summary: "Create an item in a view",
  description:
    "Creates a new item in the view's item group, after checking the Item.Create permission for the acting principal.",
  input: CreateItemInputSchema,
  output: CreateItemOutputSchema,
} as const;

export type CreateItemInput = z.input<typeof CreateItemInputSchema>;
export type ParsedCreateItemInput = z.infer<typeof CreateItemInputSchema>;
export type CreateItemOutput = z.infer<typeof CreateItemOutputSchema>;
