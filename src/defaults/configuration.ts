/**
 * Top-level defaulting pass for a KubeSchedulerConfiguration.
 *
 * Mutates the configuration in place and returns it. The pass is
 * idempotent: every assignment is guarded by an "unset" check and the merge
 * collaborator is idempotent on an already merged pipeline.
 */

import { SCHEDULER_DEFAULTS, type SchedulerDefaults } from "../config.js";
import type { FeatureGate } from "../features.js";
import { mergePlugins, type PluginMerger } from "../plugins/merge.js";
import { defaultPluginArgsScheme, type PluginArgsScheme } from "../registry/scheme.js";
import type { KubeSchedulerConfiguration, KubeSchedulerProfile } from "../types.js";
import { setProfileDefaults } from "./profile.js";
import { setParallelismDefault, setScalarDefaults } from "./scalars.js";

export interface DefaultingOptions {
  /** Argument kind registry. Built from featureGate when omitted. */
  scheme?: PluginArgsScheme;
  /** Consulted only when no scheme is given. */
  featureGate?: FeatureGate;
  merge?: PluginMerger;
  defaults?: SchedulerDefaults;
}

export function setConfigurationDefaults(
  cfg: KubeSchedulerConfiguration,
  options: DefaultingOptions = {},
): KubeSchedulerConfiguration {
  const defaults = options.defaults ?? SCHEDULER_DEFAULTS;
  const scheme = options.scheme ?? defaultPluginArgsScheme(options.featureGate);
  const merge = options.merge ?? mergePlugins;

  setParallelismDefault(cfg, defaults);

  const profiles: KubeSchedulerProfile[] = cfg.profiles ?? [];
  cfg.profiles = profiles;
  if (profiles.length === 0) {
    profiles.push({});
  }
  // With several profiles every one must be named explicitly; validation rejects the rest.
  if (profiles.length === 1 && profiles[0].schedulerName === undefined) {
    profiles[0].schedulerName = defaults.schedulerName;
  }

  for (const profile of profiles) {
    setProfileDefaults(profile, { scheme, merge });
  }

  setScalarDefaults(cfg, defaults);
  return cfg;
}
