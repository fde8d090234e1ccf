/**
 * Scheduler configuration defaulting: public entry point.
 */

export * from "./types.js";
export {
  LOG_PREFIX,
  SCHEDULER_API_VERSION,
  SCHEDULER_CONFIGURATION_KIND,
  SCHEDULER_DEFAULTS,
  mergeDefaults,
  type SchedulerDefaults,
} from "./config.js";
export { setConfigurationDefaults, type DefaultingOptions } from "./defaults/configuration.js";
export { setProfileDefaults, type ProfileDefaulting } from "./defaults/profile.js";
export { completePluginConfig } from "./defaults/plugin-config.js";
export {
  setParallelismDefault,
  setRecommendedLeaderElectionDefaults,
  setScalarDefaults,
} from "./defaults/scalars.js";
export {
  DEFAULT_FEATURE_SPECS,
  Feature,
  MutableFeatureGate,
  type FeatureGate,
  type FeatureSpec,
  type FeatureStage,
} from "./features.js";
export {
  ConfigLoadError,
  detectFormat,
  loadAndDefault,
  loadConfigurationFile,
  parseConfiguration,
  serializeConfiguration,
  toDocument,
  type ConfigFormat,
} from "./loader.js";
export { DISABLE_ALL, mergePluginSet, mergePlugins, type PluginMerger } from "./plugins/merge.js";
export { EXTENSION_POINTS, pluginNames } from "./plugins/names.js";
export { PluginName, getDefaultPlugins, type InTreePluginName } from "./plugins/registry.js";
export * from "./registry/index.js";
