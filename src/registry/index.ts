/**
 * Plugin argument registry exports.
 */

export * from "./args.js";
export {
  MAX_CUSTOM_PRIORITY_SCORE,
  defaultResourceSpec,
  type DefaultingContext,
} from "./defaults.js";
export {
  PluginArgsScheme,
  SchemeError,
  defaultPluginArgsScheme,
  type ArgsKindRegistration,
  type PluginArgsSchemeOptions,
} from "./scheme.js";
