// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/views.feed.v1.contract`
 * Purpose: Defines the build-feed payload handed to the syndication renderer.
 * Scope: Zod schemas and types for feed filter and feed output. Does not serialize RSS/Atom.
 * Invariants: builds are newest first.
 * Side-effects: none
 * Links: src/features/views/feed-exporter.ts
 * @internal
 */

import { z } from "zod";

import { BUILD_RESULTS } from "@/core";

export const FEED_FILTERS = ["all", "failed"] as const;
export const FeedFilterSchema = z.enum(FEED_FILTERS);

export const FeedBuildSchema = z.object({
  jobName: z.string(),
  number: z.number().int(),
  timestamp: z.string().datetime(),
  result: z.enum(BUILD_RESULTS).nullable(),
});

export const ViewFeedOutputSchema = z.object({
  title: z.string(),
  link: z.string(),
  builds: z.array(FeedBuildSchema),
});

export type FeedFilter = z.infer<typeof FeedFilterSchema>;
export type FeedBuild = z.infer<typeof FeedBuildSchema>;
export type ViewFeedOutput = z.infer<typeof ViewFeedOutputSchema>;
