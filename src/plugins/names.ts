/**
 * Extension point listing and plugin name collection.
 */

import type { ExtensionPoint, Plugins } from "../types.js";

export const EXTENSION_POINTS: readonly ExtensionPoint[] = [
  "multiPoint",
  "preFilter",
  "filter",
  "postFilter",
  "reserve",
  "preScore",
  "score",
  "preBind",
  "bind",
  "postBind",
  "permit",
  "queueSort",
];

/**
 * Distinct names of every enabled plugin across all extension points,
 * sorted so callers that append per name produce diff-stable output.
 */
export function pluginNames(plugins: Plugins | undefined): string[] {
  if (!plugins) {
    return [];
  }

  const names = new Set<string>();
  for (const point of EXTENSION_POINTS) {
    for (const plugin of plugins[point]?.enabled ?? []) {
      names.add(plugin.name);
    }
  }
  return [...names].sort();
}
