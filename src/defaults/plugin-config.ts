/**
 * Plugin config completion: every enabled plugin whose arguments kind is
 * registered ends up with exactly one defaulted PluginConfig entry.
 */

import { pluginNames } from "../plugins/names.js";
import { argsKindFor } from "../registry/args.js";
import type { PluginArgsScheme } from "../registry/scheme.js";
import type { KubeSchedulerProfile, PluginConfig } from "../types.js";

export function completePluginConfig(profile: KubeSchedulerProfile, scheme: PluginArgsScheme): void {
  const pluginConfig: PluginConfig[] = profile.pluginConfig ?? [];
  profile.pluginConfig = pluginConfig;

  const existing = new Set<string>();
  for (const entry of pluginConfig) {
    existing.add(entry.name);
    if (entry.args.type === "opaque") {
      continue;
    }
    scheme.default(entry.args.object);
  }

  // Append default configs for plugins that didn't have one explicitly set.
  for (const name of pluginNames(profile.plugins)) {
    if (existing.has(name)) {
      continue;
    }
    const object = scheme.newObject(argsKindFor(name));
    if (!object) {
      // Out-of-tree, or the plugin takes no configuration.
      continue;
    }
    scheme.default(object);
    pluginConfig.push({ name, args: { type: "typed", object } });
  }
}
