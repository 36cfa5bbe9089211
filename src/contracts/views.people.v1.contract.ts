// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/views.people.v1.contract`
 * Purpose: Defines the exported shape of a view's contributor activity index.
 * Scope: Zod output schema and types. Does not contain business logic.
 * Invariants: users ordered newest lastChange first; lastChange is ISO 8601.
 * Side-effects: none
 * Links: src/features/views/services/get-people.ts
 * @internal
 */

import { z } from "zod";

export const PersonActivitySchema = z.object({
  userId: z.string(),
  fullName: z.string(),
  projectName: z.string(),
  lastChange: z.string().datetime(),
  lastChangeTimeString: z.string(),
});

export const ViewPeopleOutputSchema = z.object({
  view: z.object({
    name: z.string(),
    url: z.string(),
  }),
  users: z.array(PersonActivitySchema),
});

export const viewsPeopleOperation = {
  id: "views.people.v1",
  summary: "List the contributors of a view",
  description:
    "Returns one record per user who authored a change reachable from the view, with the job and time of their latest change.",
  output: ViewPeopleOutputSchema,
} as const;

export type PersonActivity = z.infer<typeof PersonActivitySchema>;
export type ViewPeopleOutput = z.infer<typeof ViewPeopleOutputSchema>;
