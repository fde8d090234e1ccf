/**
 * Scalar defaulting for top-level KubeSchedulerConfiguration fields.
 * Every assignment is guarded by an "unset" check, so running these twice is a no-op.
 */

import { SCHEDULER_DEFAULTS, type SchedulerDefaults } from "../config.js";
import type { KubeSchedulerConfiguration, LeaderElectionConfiguration } from "../types.js";

export function setParallelismDefault(
  cfg: KubeSchedulerConfiguration,
  defaults: SchedulerDefaults = SCHEDULER_DEFAULTS,
): void {
  if (cfg.parallelism === undefined) {
    cfg.parallelism = defaults.parallelism;
  }
}

/**
 * Fill the generic leader-election timing fields shared by all components.
 */
export function setRecommendedLeaderElectionDefaults(
  le: LeaderElectionConfiguration,
  defaults: SchedulerDefaults = SCHEDULER_DEFAULTS,
): void {
  if (!le.leaseDuration) {
    le.leaseDuration = defaults.leaderElection.leaseDuration;
  }
  if (!le.renewDeadline) {
    le.renewDeadline = defaults.leaderElection.renewDeadline;
  }
  if (!le.retryPeriod) {
    le.retryPeriod = defaults.leaderElection.retryPeriod;
  }
  if (le.leaderElect === undefined) {
    le.leaderElect = defaults.leaderElection.leaderElect;
  }
}

/**
 * Fill every scalar except parallelism: node scoring percentage, leader
 * election, client connection, backoff and profiling.
 */
export function setScalarDefaults(
  cfg: KubeSchedulerConfiguration,
  defaults: SchedulerDefaults = SCHEDULER_DEFAULTS,
): void {
  if (cfg.percentageOfNodesToScore === undefined) {
    cfg.percentageOfNodesToScore = defaults.percentageOfNodesToScore;
  }

  const le: LeaderElectionConfiguration = cfg.leaderElection ?? {};
  cfg.leaderElection = le;
  // Lease-based locking only; the scheduler never uses endpoints locks.
  if (!le.resourceLock) {
    le.resourceLock = defaults.leaderElection.resourceLock;
  }
  if (!le.resourceNamespace) {
    le.resourceNamespace = defaults.leaderElection.resourceNamespace;
  }
  if (!le.resourceName) {
    le.resourceName = defaults.leaderElection.resourceName;
  }

  const cc = cfg.clientConnection ?? {};
  cfg.clientConnection = cc;
  if (!cc.contentType) {
    cc.contentType = defaults.clientConnection.contentType;
  }
  // The scheduler keeps its own QPS/burst instead of the generic client values.
  if (!cc.qps) {
    cc.qps = defaults.clientConnection.qps;
  }
  if (!cc.burst) {
    cc.burst = defaults.clientConnection.burst;
  }

  setRecommendedLeaderElectionDefaults(le, defaults);

  if (cfg.podInitialBackoffSeconds === undefined) {
    cfg.podInitialBackoffSeconds = defaults.podInitialBackoffSeconds;
  }
  if (cfg.podMaxBackoffSeconds === undefined) {
    cfg.podMaxBackoffSeconds = defaults.podMaxBackoffSeconds;
  }

  if (cfg.enableProfiling === undefined) {
    cfg.enableProfiling = defaults.enableProfiling;
  }
  // Must run after the profiling default is resolved.
  if (cfg.enableProfiling && cfg.enableContentionProfiling === undefined) {
    cfg.enableContentionProfiling = defaults.enableContentionProfiling;
  }
}
