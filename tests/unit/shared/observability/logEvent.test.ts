// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/observability/logEvent`
 * Purpose: Verifies the structured event logger and the metrics registry singleton.
 * Scope: logEvent payload shape and reqId enforcement; metric registration. Does not test pino transports.
 * Side-effects: none
 * Links: src/shared/observability/logEvent.ts, src/shared/observability/metrics.ts
 * @public
 */

import { describe, expect, it, vi } from "vitest";

import {
  EVENT_NAMES,
  ITEM_CREATE_OUTCOMES,
  logEvent,
  makeNoopLogger,
  metricsRegistry,
  viewsItemCreateTotal,
} from "@/shared/observability";

describe("shared/observability/logEvent", () => {
  it("logs the event name with its fields", () => {
    const log = makeNoopLogger();
    const info = vi.spyOn(log, "info");

    logEvent(log, EVENT_NAMES.VIEWS_FEED_EXPORTED, {
      reqId: "req-1",
      viewName: "team",
    });

    expect(info).toHaveBeenCalledWith(
      { event: "views.feed_exported", reqId: "req-1", viewName: "team" },
      "views.feed_exported"
    );
  });

  it("throws under vitest when reqId is missing", () => {
    expect(() =>
      logEvent(makeNoopLogger(), EVENT_NAMES.VIEWS_PEOPLE_SCANNED, { reqId: "" })
    ).toThrow('INVARIANT VIOLATION: logEvent("views.people_scanned") called without reqId');
  });
});

describe("shared/observability/metrics", () => {
  it("registers the view metrics once", () => {
    expect(metricsRegistry.getSingleMetric("views_item_create_total")).toBeDefined();
    expect(metricsRegistry.getSingleMetric("views_permission_denied_total")).toBeDefined();
    expect(
      metricsRegistry.getSingleMetric("views_people_scan_duration_ms")
    ).toBeDefined();
  });

  it("accepts every item-creation outcome as a label", async () => {
    for (const outcome of ITEM_CREATE_OUTCOMES) {
      viewsItemCreateTotal.inc({ outcome });
    }

    const metric = await viewsItemCreateTotal.get();
    const labels = metric.values.map((v) => v.labels.outcome);
    expect(ITEM_CREATE_OUTCOMES.every((o) => labels.includes(o))).toBe(true);
  });
});
