// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/views/services/create-item`
 * Purpose: Verifies the item-creation service's result mapping, events and outcome metric.
 * Scope: createItemInView over in-memory adapters. Does not resolve principals.
 * Invariants: Never throws for domain failures; exactly one outcome increment per call.
 * Side-effects: global (outcome counter)
 * Links: src/features/views/services/create-item.ts
 * @public
 */

import { makeJob, makeTestCtx, makeViewDeps } from "@tests/_fakes";
import { describe, expect, it, vi } from "vitest";

import type { Item } from "@/core";
import { authenticatedPrincipal, ITEM_CREATE } from "@/core";
import { createItemInView, ListView } from "@/features/views/public";
import type { ItemGroup } from "@/ports";
import { viewsItemCreateTotal } from "@/shared/observability";

const alice = authenticatedPrincipal("alice");

async function outcomeCount(outcome: string): Promise<number> {
  const metric = await viewsItemCreateTotal.get();
  return metric.values.find((v) => v.labels.outcome === outcome)?.value ?? 0;
}

describe("createItemInView", () => {
  it("returns the created item's name and URL within the view", async () => {
    const deps = makeViewDeps();
    deps.authorization.grant("alice", ITEM_CREATE);
    const view = new ListView(deps, "team");
    const ctx = makeTestCtx();
    const info = vi.spyOn(ctx.log, "info");
    const before = await outcomeCount("created");

    const result = await createItemInView(view, alice, { name: "api server" }, ctx);

    expect(result).toEqual({
      ok: true,
      item: { name: "api server", url: "view/team/job/api%20server/" },
    });
    expect(await outcomeCount("created")).toBe(before + 1);
    expect(info).toHaveBeenCalledWith(
      {
        event: "views.item_created",
        reqId: "test-req-1",
        viewName: "team",
        itemName: "api server",
        principalId: "alice",
      },
      "views.item_created"
    );
  });

  it("reports a denial without touching the item group", async () => {
    const deps = makeViewDeps([makeJob("web")]);
    const view = new ListView(deps, "team");
    const before = await outcomeCount("denied");

    const result = await createItemInView(view, alice, { name: "api" }, makeTestCtx());

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "ACCESS_DENIED",
        principalId: "alice",
        permissionId: "Item.Create",
        scope: "global",
      },
    });
    expect(deps.itemGroup.getItems().map((i) => i.name)).toEqual(["web"]);
    expect(await outcomeCount("denied")).toBe(before + 1);
  });

  it("reports invalid requests", async () => {
    const deps = makeViewDeps();
    deps.authorization.setAllowAll(true);
    const before = await outcomeCount("invalid");

    const result = await createItemInView(
      new ListView(deps, "team"),
      alice,
      { name: "a;b" },
      makeTestCtx()
    );

    expect(result).toEqual({
      ok: false,
      error: { kind: "INVALID_REQUEST", issues: ['name contains unsafe character ";"'] },
    });
    expect(await outcomeCount("invalid")).toBe(before + 1);
  });

  it("reports name collisions", async () => {
    const deps = makeViewDeps([makeJob("api")]);
    deps.authorization.setAllowAll(true);
    const before = await outcomeCount("exists");

    const result = await createItemInView(
      new ListView(deps, "team"),
      alice,
      { name: "api" },
      makeTestCtx()
    );

    expect(result).toEqual({ ok: false, error: { kind: "ITEM_EXISTS", itemName: "api" } });
    expect(await outcomeCount("exists")).toBe(before + 1);
  });

  it("maps unexpected item-group failures to GENERIC and logs them", async () => {
    const failingGroup: ItemGroup = {
      getItems: (): readonly Item[] => [],
      getItem: () => undefined,
      createItem: () => Promise.reject(new Error("store unavailable")),
    };
    const deps = { ...makeViewDeps(), itemGroup: failingGroup };
    deps.authorization.setAllowAll(true);
    const ctx = makeTestCtx();
    const error = vi.spyOn(ctx.log, "error");
    const before = await outcomeCount("error");

    const result = await createItemInView(
      new ListView(deps, "team"),
      alice,
      { name: "api" },
      ctx
    );

    expect(result).toEqual({
      ok: false,
      error: { kind: "GENERIC", message: "store unavailable" },
    });
    expect(await outcomeCount("error")).toBe(before + 1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
