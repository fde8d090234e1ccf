/**
 * Core type definitions for the scheduler configuration model.
 * Field names follow the serialized KubeSchedulerConfiguration document.
 * Optional fields left undefined are "unset" and receive defaults.
 */

// ============================================================================
// Plugin pipeline
// ============================================================================

export type ExtensionPoint =
  | "multiPoint"
  | "preFilter"
  | "filter"
  | "postFilter"
  | "reserve"
  | "preScore"
  | "score"
  | "preBind"
  | "bind"
  | "postBind"
  | "permit"
  | "queueSort";

export interface Plugin {
  name: string;
  weight?: number;                // Only meaningful for scoring extension points
}

export interface PluginSet {
  enabled?: Plugin[];
  disabled?: Plugin[];
}

export type Plugins = { [P in ExtensionPoint]?: PluginSet };

// ============================================================================
// Plugin arguments
// ============================================================================

/**
 * A registry-known argument object. `kind` and `apiVersion` identify the
 * registration that created or decoded it.
 */
export interface PluginArgsObject {
  kind: string;
  apiVersion: string;
  [field: string]: unknown;
}

/**
 * Arguments attached to a plugin. Opaque arguments are never defaulted or
 * rewritten; validation deals with them later.
 */
export type PluginArgs =
  | { type: "typed"; object: PluginArgsObject }
  | { type: "opaque"; raw: unknown };

export interface PluginConfig {
  name: string;
  args: PluginArgs;
}

// ============================================================================
// Profiles and configuration
// ============================================================================

export interface KubeSchedulerProfile {
  schedulerName?: string;
  plugins?: Plugins;
  pluginConfig?: PluginConfig[];
}

export interface LeaderElectionConfiguration {
  leaderElect?: boolean;
  leaseDuration?: string;         // Duration string, e.g. "15s"
  renewDeadline?: string;
  retryPeriod?: string;
  resourceLock?: string;
  resourceName?: string;
  resourceNamespace?: string;
}

export interface ClientConnectionConfiguration {
  kubeconfig?: string;
  acceptContentTypes?: string;
  contentType?: string;
  qps?: number;                   // 0 counts as unset
  burst?: number;                 // 0 counts as unset
}

export interface KubeSchedulerConfiguration {
  apiVersion?: string;
  kind?: string;
  parallelism?: number;
  profiles?: KubeSchedulerProfile[];
  percentageOfNodesToScore?: number;
  leaderElection?: LeaderElectionConfiguration;
  clientConnection?: ClientConnectionConfiguration;
  podInitialBackoffSeconds?: number;
  podMaxBackoffSeconds?: number;
  enableProfiling?: boolean;
  enableContentionProfiling?: boolean;
  extenders?: unknown[];          // Carried through untouched
}
