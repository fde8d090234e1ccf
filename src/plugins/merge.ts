/**
 * Merge of the default plugin set with a profile's own plugin configuration.
 * Pure: neither input is mutated and the result shares no objects with them.
 */

import { LOG_PREFIX } from "../config.js";
import type { Plugin, PluginSet, Plugins } from "../types.js";
import { EXTENSION_POINTS } from "./names.js";

/** Disabling "*" drops every default plugin at that extension point. */
export const DISABLE_ALL = "*";

/**
 * Collaborator used by the profile defaulter. Must be idempotent:
 * merge(d, merge(d, x)) equals merge(d, x).
 */
export type PluginMerger = (defaults: Plugins, custom: Plugins | undefined) => Plugins;

export function mergePlugins(defaults: Plugins, custom: Plugins | undefined): Plugins {
  const merged: Plugins = {};
  for (const point of EXTENSION_POINTS) {
    merged[point] = custom
      ? mergePluginSet(defaults[point] ?? {}, custom[point] ?? {})
      : copyPluginSet(defaults[point] ?? {});
  }
  return merged;
}

/**
 * Merge one extension point.
 *
 * Default plugins keep their order. A default plugin the custom set enables
 * again is replaced in place by the custom entry; custom plugins that replace
 * nothing are appended in their own order.
 */
export function mergePluginSet(defaultSet: PluginSet, customSet: PluginSet): PluginSet {
  const disabledNames = new Set<string>();
  const disabled: Plugin[] = [];
  for (const plugin of customSet.disabled ?? []) {
    // Kept even for "*" so later merges still know defaults were dropped.
    disabled.push({ name: plugin.name });
    disabledNames.add(plugin.name);
  }

  const customEnabled = customSet.enabled ?? [];
  const customIndex = new Map<string, number>();
  customEnabled.forEach((plugin, index) => customIndex.set(plugin.name, index));

  const replaced = new Set<number>();
  const enabled: Plugin[] = [];
  if (!disabledNames.has(DISABLE_ALL)) {
    for (const defaultPlugin of defaultSet.enabled ?? []) {
      if (disabledNames.has(defaultPlugin.name)) {
        continue;
      }
      const index = customIndex.get(defaultPlugin.name);
      if (index === undefined) {
        enabled.push({ ...defaultPlugin });
        continue;
      }
      const customPlugin = customEnabled[index];
      if (customPlugin.weight !== defaultPlugin.weight) {
        console.log(`${LOG_PREFIX} Default plugin "${defaultPlugin.name}" is explicitly re-configured; overriding`);
      }
      enabled.push({ ...customPlugin });
      replaced.add(index);
    }
  }

  customEnabled.forEach((plugin, index) => {
    if (!replaced.has(index)) {
      enabled.push({ ...plugin });
    }
  });

  return { enabled, disabled };
}

function copyPluginSet(set: PluginSet): PluginSet {
  return {
    enabled: (set.enabled ?? []).map((plugin) => ({ ...plugin })),
    disabled: (set.disabled ?? []).map((plugin) => ({ name: plugin.name })),
  };
}
