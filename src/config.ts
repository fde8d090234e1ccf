/**
 * SchedulerDefaults and the built-in default table.
 * Every constant the defaulting pass assigns lives here; callers that need
 * different values pass a substitute table instead of mutating this one.
 */

export const SCHEDULER_API_VERSION = "kubescheduler.config.k8s.io/v1";
export const SCHEDULER_CONFIGURATION_KIND = "KubeSchedulerConfiguration";
export const LOG_PREFIX = "[scheduler-config]";

export interface LeaderElectionDefaults {
  readonly leaderElect: boolean;
  readonly leaseDuration: string;
  readonly renewDeadline: string;
  readonly retryPeriod: string;
  readonly resourceLock: string;
  readonly resourceNamespace: string;
  readonly resourceName: string;
}

export interface ClientConnectionDefaults {
  readonly contentType: string;
  readonly qps: number;
  readonly burst: number;
}

export interface SchedulerDefaults {
  readonly parallelism: number;                 // Default: 16
  readonly percentageOfNodesToScore: number;    // Default: 0 (adaptive)
  readonly schedulerName: string;               // Default: "default-scheduler"
  readonly leaderElection: LeaderElectionDefaults;
  readonly clientConnection: ClientConnectionDefaults;
  readonly podInitialBackoffSeconds: number;    // Default: 1
  readonly podMaxBackoffSeconds: number;        // Default: 10
  readonly enableProfiling: boolean;            // Default: true
  readonly enableContentionProfiling: boolean;  // Default: true, only with profiling
}

export const SCHEDULER_DEFAULTS: SchedulerDefaults = Object.freeze({
  parallelism: 16,
  percentageOfNodesToScore: 0,
  schedulerName: "default-scheduler",
  leaderElection: Object.freeze({
    leaderElect: true,
    leaseDuration: "15s",
    renewDeadline: "10s",
    retryPeriod: "2s",
    resourceLock: "leases",
    resourceNamespace: "kube-system",
    resourceName: "kube-scheduler",
  }),
  clientConnection: Object.freeze({
    contentType: "application/vnd.kubernetes.protobuf",
    qps: 50,
    burst: 100,
  }),
  podInitialBackoffSeconds: 1,
  podMaxBackoffSeconds: 10,
  enableProfiling: true,
  enableContentionProfiling: true,
});

/**
 * Build a defaults table from the built-in one.
 * Top-level properties in partial override the built-in table.
 */
export function mergeDefaults(partial: Partial<SchedulerDefaults>): SchedulerDefaults {
  return Object.freeze({
    ...SCHEDULER_DEFAULTS,
    ...partial,
  });
}
