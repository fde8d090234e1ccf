/**
 * Unit tests for scalar defaulting.
 */

import { describe, it, expect } from "vitest";
import { SCHEDULER_DEFAULTS, mergeDefaults } from "../../src/config.js";
import {
  setParallelismDefault,
  setRecommendedLeaderElectionDefaults,
  setScalarDefaults,
} from "../../src/defaults/scalars.js";
import type { KubeSchedulerConfiguration, LeaderElectionConfiguration } from "../../src/types.js";

describe("setParallelismDefault", () => {
  it("should default parallelism to 16", () => {
    const cfg: KubeSchedulerConfiguration = {};
    setParallelismDefault(cfg);
    expect(cfg.parallelism).toBe(16);
  });

  it("should keep an explicit parallelism", () => {
    const cfg: KubeSchedulerConfiguration = { parallelism: 4 };
    setParallelismDefault(cfg);
    expect(cfg.parallelism).toBe(4);
  });
});

describe("setScalarDefaults", () => {
  it("should fill every scalar of an empty configuration", () => {
    const cfg: KubeSchedulerConfiguration = {};
    setScalarDefaults(cfg);

    expect(cfg).toEqual({
      percentageOfNodesToScore: 0,
      leaderElection: {
        leaderElect: true,
        leaseDuration: "15s",
        renewDeadline: "10s",
        retryPeriod: "2s",
        resourceLock: "leases",
        resourceNamespace: "kube-system",
        resourceName: "kube-scheduler",
      },
      clientConnection: {
        contentType: "application/vnd.kubernetes.protobuf",
        qps: 50,
        burst: 100,
      },
      podInitialBackoffSeconds: 1,
      podMaxBackoffSeconds: 10,
      enableProfiling: true,
      enableContentionProfiling: true,
    });
  });

  it("should treat zero qps and burst as unset", () => {
    const cfg: KubeSchedulerConfiguration = { clientConnection: { qps: 0, burst: 0, contentType: "" } };
    setScalarDefaults(cfg);

    expect(cfg.clientConnection).toEqual({
      contentType: "application/vnd.kubernetes.protobuf",
      qps: 50,
      burst: 100,
    });
  });

  it("should keep values the operator set", () => {
    const cfg: KubeSchedulerConfiguration = {
      percentageOfNodesToScore: 50,
      leaderElection: { resourceLock: "configmapsleases", resourceName: "custom", leaderElect: false },
      clientConnection: { contentType: "application/json", qps: 12.5, burst: 7 },
      podInitialBackoffSeconds: 3,
      podMaxBackoffSeconds: 30,
    };
    setScalarDefaults(cfg);

    expect(cfg.percentageOfNodesToScore).toBe(50);
    expect(cfg.leaderElection).toEqual({
      resourceLock: "configmapsleases",
      resourceName: "custom",
      resourceNamespace: "kube-system",
      leaderElect: false,
      leaseDuration: "15s",
      renewDeadline: "10s",
      retryPeriod: "2s",
    });
    expect(cfg.clientConnection).toEqual({ contentType: "application/json", qps: 12.5, burst: 7 });
    expect(cfg.podInitialBackoffSeconds).toBe(3);
    expect(cfg.podMaxBackoffSeconds).toBe(30);
  });

  it("should not enable contention profiling when profiling is disabled", () => {
    const cfg: KubeSchedulerConfiguration = { enableProfiling: false };
    setScalarDefaults(cfg);

    expect(cfg.enableProfiling).toBe(false);
    expect(cfg.enableContentionProfiling).toBeUndefined();
  });

  it("should keep contention profiling off when explicitly disabled", () => {
    const cfg: KubeSchedulerConfiguration = { enableContentionProfiling: false };
    setScalarDefaults(cfg);

    expect(cfg.enableProfiling).toBe(true);
    expect(cfg.enableContentionProfiling).toBe(false);
  });

  it("should use a substituted defaults table", () => {
    const cfg: KubeSchedulerConfiguration = {};
    setScalarDefaults(cfg, mergeDefaults({ podMaxBackoffSeconds: 60, enableProfiling: false }));

    expect(cfg.podMaxBackoffSeconds).toBe(60);
    expect(cfg.enableProfiling).toBe(false);
    expect(cfg.enableContentionProfiling).toBeUndefined();
  });

  it("should not change an already defaulted configuration", () => {
    const cfg: KubeSchedulerConfiguration = {};
    setScalarDefaults(cfg);
    const once = structuredClone(cfg);
    setScalarDefaults(cfg);

    expect(cfg).toEqual(once);
  });
});

describe("setRecommendedLeaderElectionDefaults", () => {
  it("should only fill timing fields and the leader-elect flag", () => {
    const le: LeaderElectionConfiguration = { renewDeadline: "5s" };
    setRecommendedLeaderElectionDefaults(le);

    expect(le).toEqual({
      renewDeadline: "5s",
      leaseDuration: "15s",
      retryPeriod: "2s",
      leaderElect: true,
    });
  });
});

describe("SCHEDULER_DEFAULTS", () => {
  it("should be frozen", () => {
    expect(Object.isFrozen(SCHEDULER_DEFAULTS)).toBe(true);
    expect(Object.isFrozen(SCHEDULER_DEFAULTS.leaderElection)).toBe(true);
    expect(Object.isFrozen(SCHEDULER_DEFAULTS.clientConnection)).toBe(true);
  });
});
