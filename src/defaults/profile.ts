/**
 * Profile defaulting: default plugin set merged with the profile's own
 * plugins, then plugin config completion.
 */

import type { PluginMerger } from "../plugins/merge.js";
import { getDefaultPlugins } from "../plugins/registry.js";
import type { PluginArgsScheme } from "../registry/scheme.js";
import type { KubeSchedulerProfile } from "../types.js";
import { completePluginConfig } from "./plugin-config.js";

export interface ProfileDefaulting {
  scheme: PluginArgsScheme;
  merge: PluginMerger;
}

/**
 * Errors thrown by the merge collaborator propagate unchanged.
 */
export function setProfileDefaults(profile: KubeSchedulerProfile, defaulting: ProfileDefaulting): void {
  profile.plugins = defaulting.merge(getDefaultPlugins(), profile.plugins);
  completePluginConfig(profile, defaulting.scheme);
}
