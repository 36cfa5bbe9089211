// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/views/permissions`
 * Purpose: Permission values checked by views and the implication chain between them.
 * Scope: Constant permission definitions and lookup helpers. Does not decide who holds a permission.
 * Invariants: Permission ids are `<Group>.<Name>` and unique; implication chains terminate at ADMINISTER.
 * Side-effects: none
 * Links: src/features/views/acl-gate.ts, src/adapters/server/authorization/policy-authorization.adapter.ts
 * @public
 */

export interface PermissionGroup {
  readonly id: string;
  readonly title: string;
}

export interface Permission {
  /** `<Group>.<Name>`, e.g. "View.Create" */
  readonly id: string;
  readonly group: PermissionGroup;
  readonly name: string;
  /** Holding this permission also grants the current one */
  readonly impliedBy: Permission | null;
}

function definePermission(
  group: PermissionGroup,
  name: string,
  impliedBy: Permission | null
): Permission {
  return Object.freeze({
    id: `${group.id}.${name}`,
    group,
    name,
    impliedBy,
  });
}

export const SYSTEM_PERMISSIONS: PermissionGroup = Object.freeze({
  id: "System",
  title: "Overall",
});

export const VIEW_PERMISSIONS: PermissionGroup = Object.freeze({
  id: "View",
  title: "View",
});

export const ITEM_PERMISSIONS: PermissionGroup = Object.freeze({
  id: "Item",
  title: "Job",
});

export const ADMINISTER = definePermission(
  SYSTEM_PERMISSIONS,
  "Administer",
  null
);
export const READ = definePermission(SYSTEM_PERMISSIONS, "Read", ADMINISTER);

export const VIEW_CREATE = definePermission(VIEW_PERMISSIONS, "Create", ADMINISTER);
export const VIEW_DELETE = definePermission(VIEW_PERMISSIONS, "Delete", ADMINISTER);
export const VIEW_CONFIGURE = definePermission(
  VIEW_PERMISSIONS,
  "Configure",
  ADMINISTER
);

/** Permission to create new items through a view */
export const ITEM_CREATE = definePermission(ITEM_PERMISSIONS, "Create", ADMINISTER);

export const ALL_PERMISSIONS: readonly Permission[] = [
  ADMINISTER,
  READ,
  VIEW_CREATE,
  VIEW_DELETE,
  VIEW_CONFIGURE,
  ITEM_CREATE,
];

export function findPermission(id: string): Permission | undefined {
  return ALL_PERMISSIONS.find((permission) => permission.id === id);
}

/**
 * The permission followed by everything that implies it, nearest first.
 */
export function implicationChain(permission: Permission): Permission[] {
  const chain: Permission[] = [];
  let current: Permission | null = permission;
  while (current) {
    chain.push(current);
    current = current.impliedBy;
  }
  return chain;
}
