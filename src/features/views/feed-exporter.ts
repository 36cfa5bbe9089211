// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/views/feed-exporter`
 * Purpose: Collects a view's builds into an ordered syndication feed.
 * Scope: Build collection, failure filtering, ordering via RunOrdering, and mapping to the feed contract. Does not serialize RSS/Atom.
 * Invariants: Only completed builds of build-producing jobs contribute; runs are newest first as RunOrdering defines.
 * Side-effects: none
 * Links: src/contracts/views.feed.v1.contract.ts
 * @public
 */

import type { FeedFilter, ViewFeedOutput } from "@/contracts/views.feed.v1.contract";
import { hasBuildHistory, type Item, type JobRun } from "@/core";
import type { RunOrdering } from "@/ports";

export type { FeedFilter } from "@/contracts/views.feed.v1.contract";

const FEED_TITLE_SUFFIX: Record<FeedFilter, string> = {
  all: " all builds",
  failed: " failed builds",
};

/** The part of a view a feed is built from */
export interface FeedSource {
  getItems(): readonly Item[];
  getDisplayName(): string;
  getUrl(): string;
}

export interface Feed {
  readonly title: string;
  readonly link: string;
  readonly runs: readonly JobRun[];
}

/** Builds still running (result null) are left out */
function collectRuns(items: readonly Item[]): JobRun[] {
  const runs: JobRun[] = [];
  for (const item of items) {
    for (const job of item.getAllJobs()) {
      if (!hasBuildHistory(job)) continue;
      for (const build of job.buildHistory.getBuilds()) {
        if (build.result === null) continue;
        runs.push({ job, build });
      }
    }
  }
  return runs;
}

export function exportFeed(
  source: FeedSource,
  filter: FeedFilter,
  ordering: RunOrdering
): Feed {
  let runs = collectRuns(source.getItems());
  if (filter === "failed") {
    runs = runs.filter((run) => ordering.isFailure(run.build));
  }

  return {
    title: `${source.getDisplayName()}${FEED_TITLE_SUFFIX[filter]}`,
    link: source.getUrl(),
    runs: ordering.newestFirst(runs),
  };
}

export function toFeedOutput(feed: Feed): ViewFeedOutput {
  return {
    title: feed.title,
    link: feed.link,
    builds: feed.runs.map(({ job, build }) => ({
      jobName: job.name,
      number: build.number,
      timestamp: new Date(build.timestamp).toISOString(),
      result: build.result,
    })),
  };
}
