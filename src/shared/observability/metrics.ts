// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/metrics`
 * Purpose: Prometheus metrics registry and view metric definitions.
 * Scope: Shared observability singleton. Does not expose a scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality.
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: getOrCreate pattern prevents duplicate registration when test files re-import the module.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

const globalForMetrics = globalThis as typeof globalThis & {
  viewsMetricsRegistry?: Registry;
};

export const metricsRegistry: Registry =
  globalForMetrics.viewsMetricsRegistry ?? new client.Registry();

if (!globalForMetrics.viewsMetricsRegistry) {
  globalForMetrics.viewsMetricsRegistry = metricsRegistry;
  metricsRegistry.setDefaultLabels({
    app: "build-views",
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: [...labelNames],
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram(
  name: string,
  help: string,
  buckets: number[]
): Histogram {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram;
  return new client.Histogram({
    name,
    help,
    buckets,
    registers: [metricsRegistry],
  });
}

export const ITEM_CREATE_OUTCOMES = [
  "created",
  "denied",
  "invalid",
  "exists",
  "error",
] as const;
export type ItemCreateOutcome = (typeof ITEM_CREATE_OUTCOMES)[number];

export const viewsItemCreateTotal = getOrCreateCounter(
  "views_item_create_total",
  "Item creation attempts through views, by outcome",
  ["outcome"] as const
);

export const viewsPermissionDeniedTotal = getOrCreateCounter(
  "views_permission_denied_total",
  "Permission checks that denied the acting principal",
  ["permission"] as const
);

export const viewsPeopleScanDurationMs = getOrCreateHistogram(
  "views_people_scan_duration_ms",
  "Time to build a view's contributor activity index",
  [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000]
);
