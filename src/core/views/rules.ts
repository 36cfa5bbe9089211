// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/views/rules`
 * Purpose: Pure rules for view URLs, view ordering and item names.
 * Scope: Deterministic string rules. Does not look up items or views.
 * Invariants:
 * - View URLs never start with "/"; they end with "/" except the root view's, which is "".
 * - Sibling views sort by view name in code-unit order.
 * Side-effects: none
 * @public
 */

export const ROOT_VIEW_URL = "";

/** Characters that may not appear in an item name */
export const UNSAFE_NAME_CHARACTERS = "?*/\\%!@#$^&|<>[]:;";

/**
 * Relative URL of a named (non-root) view, e.g. `view/team/`.
 */
export function namedViewUrl(viewName: string): string {
  return `view/${encodeURIComponent(viewName)}/`;
}

/**
 * URL of an item as seen through a view, e.g. `view/team/job/api/`.
 */
export function itemUrlInView(viewUrl: string, itemName: string): string {
  return `${viewUrl}job/${encodeURIComponent(itemName)}/`;
}

/**
 * @returns true when `url` has the shape views must return
 */
export function isWellFormedViewUrl(url: string, isRoot: boolean): boolean {
  if (isRoot) return url === ROOT_VIEW_URL;
  return url.length > 1 && !url.startsWith("/") && url.endsWith("/");
}

/**
 * Join the application root path and a view URL.
 * Trailing slashes on `rootPath` collapse into the single separator.
 */
export function absoluteViewUrl(rootPath: string, viewUrl: string): string {
  return `${rootPath.replace(/\/+$/, "")}/${viewUrl}`;
}

export function compareViewNames(lhs: string, rhs: string): number {
  if (lhs < rhs) return -1;
  if (lhs > rhs) return 1;
  return 0;
}

/**
 * Name checks for new items.
 * @returns Human-readable issues; empty when the name is acceptable
 */
export function checkItemName(name: string): string[] {
  if (name.length === 0) {
    return ["name must not be empty"];
  }

  const issues: string[] = [];
  if (name.trim() !== name) {
    issues.push("name must not start or end with whitespace");
  }
  if (name === "." || name === "..") {
    issues.push(`"${name}" is not a valid name`);
  }
  for (const ch of name) {
    if (UNSAFE_NAME_CHARACTERS.includes(ch)) {
      issues.push(`name contains unsafe character "${ch}"`);
      break;
    }
  }
  return issues;
}
