// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for runtime dependency injection. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; authorization is policy-backed unless APP_ENV=test.
 * Side-effects: IO (reads the ACL policy file, initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire an allow-all FakeAuthorizationAdapter.
 * Links: Used by entry points that construct views; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  InMemoryItemGroup,
  PolicyAuthorizationAdapter,
  SystemClock,
  TimestampRunOrdering,
} from "@/adapters/server";
import { FakeAuthorizationAdapter } from "@/adapters/test";
import type {
  AuthorizationPort,
  Clock,
  ItemGroup,
  RunOrdering,
} from "@/ports";
import { loadAclPolicy } from "@/shared/config";
import { serverEnv } from "@/shared/env";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";

export interface ContainerConfig {
  /** Prefix for absolute view URLs */
  rootUrl: string;
  /** Deploy environment for metrics/logging (e.g., "local", "preview", "production") */
  DEPLOY_ENVIRONMENT: string;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  clock: Clock;
  authorization: AuthorizationPort;
  runOrdering: RunOrdering;
  itemGroup: ItemGroup;
}

/** What every view needs from the container */
export type ViewsDeps = Pick<
  Container,
  "itemGroup" | "authorization" | "runOrdering"
> & { rootUrl: string };

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ service: "build-views" });

  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
    },
    "container initialized"
  );

  const authorization: AuthorizationPort = env.isTestMode
    ? new FakeAuthorizationAdapter(true, { recordChecks: false })
    : (() => {
        const policy = loadAclPolicy(env.ACL_POLICY_PATH);
        log.info(
          {
            event: EVENT_NAMES.ADAPTER_ACL_POLICY_LOADED,
            path: env.ACL_POLICY_PATH,
            scopeCount: Object.keys(policy.scopes).length,
          },
          EVENT_NAMES.ADAPTER_ACL_POLICY_LOADED
        );
        return new PolicyAuthorizationAdapter(policy);
      })();

  const config: ContainerConfig = {
    rootUrl: env.ROOT_URL,
    DEPLOY_ENVIRONMENT: env.DEPLOY_ENVIRONMENT,
  };

  return {
    log,
    config,
    clock: new SystemClock(),
    authorization,
    runOrdering: new TimestampRunOrdering(),
    itemGroup: new InMemoryItemGroup(),
  };
}

export function resolveViewsDeps(): ViewsDeps {
  const container = getContainer();
  return {
    itemGroup: container.itemGroup,
    authorization: container.authorization,
    runOrdering: container.runOrdering,
    rootUrl: container.config.rootUrl,
  };
}
