/**
 * Unit tests for the top-level configuration defaulting pass.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { SCHEDULER_API_VERSION, mergeDefaults } from "../../src/config.js";
import { setConfigurationDefaults } from "../../src/defaults/configuration.js";
import { Feature, MutableFeatureGate } from "../../src/features.js";
import { pluginNames } from "../../src/plugins/names.js";
import { getDefaultPlugins } from "../../src/plugins/registry.js";
import { argsKindFor } from "../../src/registry/args.js";
import { defaultPluginArgsScheme } from "../../src/registry/scheme.js";
import type { KubeSchedulerConfiguration, PluginArgsObject } from "../../src/types.js";
import { StaticFeatureGate, opaqueArgs, passthroughMerger, typedArgs } from "../helpers/fixtures.js";

const apiVersion = SCHEDULER_API_VERSION;

function argsOf(cfg: KubeSchedulerConfiguration, profileIndex: number, pluginName: string): PluginArgsObject | undefined {
  const entry = cfg.profiles?.[profileIndex].pluginConfig?.find((e) => e.name === pluginName);
  return entry?.args.type === "typed" ? entry.args.object : undefined;
}

describe("setConfigurationDefaults", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should fill scalar defaults of an empty configuration", () => {
    const cfg = setConfigurationDefaults({});

    expect(cfg.parallelism).toBe(16);
    expect(cfg.clientConnection?.qps).toBe(50);
    expect(cfg.clientConnection?.burst).toBe(100);
    expect(cfg.podInitialBackoffSeconds).toBe(1);
    expect(cfg.podMaxBackoffSeconds).toBe(10);
    expect(cfg.enableProfiling).toBe(true);
    expect(cfg.enableContentionProfiling).toBe(true);
    expect(cfg.percentageOfNodesToScore).toBe(0);
    expect(cfg.leaderElection?.resourceLock).toBe("leases");
  });

  it("should add one profile named after the default scheduler", () => {
    const cfg = setConfigurationDefaults({});

    expect(cfg.profiles).toHaveLength(1);
    expect(cfg.profiles?.[0].schedulerName).toBe("default-scheduler");
    expect(cfg.profiles?.[0].plugins?.multiPoint?.enabled).toEqual(getDefaultPlugins().multiPoint?.enabled);
  });

  it("should add defaulted args for every default plugin with a registered kind", () => {
    const cfg = setConfigurationDefaults({});

    expect(cfg.profiles?.[0].pluginConfig?.map((entry) => entry.name)).toEqual([
      "DefaultPreemption",
      "InterPodAffinity",
      "NodeAffinity",
      "NodeResourcesBalancedAllocation",
      "NodeResourcesFit",
      "PodTopologySpread",
      "VolumeBinding",
    ]);
    expect(argsOf(cfg, 0, "NodeResourcesFit")).toEqual({
      kind: "NodeResourcesFitArgs",
      apiVersion,
      scoringStrategy: {
        type: "LeastAllocated",
        resources: [
          { name: "cpu", weight: 1 },
          { name: "memory", weight: 1 },
        ],
      },
    });
  });

  it("should name a single unnamed profile but leave several unnamed profiles alone", () => {
    const single = setConfigurationDefaults({ profiles: [{ schedulerName: "custom" }] });
    expect(single.profiles?.[0].schedulerName).toBe("custom");

    const several = setConfigurationDefaults({ profiles: [{}, {}] });
    expect(several.profiles?.map((profile) => profile.schedulerName)).toEqual([undefined, undefined]);
    expect(several.profiles?.[1].pluginConfig).toHaveLength(7);
  });

  it("should keep an explicitly empty scheduler name", () => {
    const cfg = setConfigurationDefaults({ profiles: [{ schedulerName: "" }] });
    expect(cfg.profiles?.[0].schedulerName).toBe("");
  });

  it("should be idempotent", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const cfg: KubeSchedulerConfiguration = {
      profiles: [
        {
          schedulerName: "batch",
          plugins: {
            multiPoint: { enabled: [{ name: "TaintToleration", weight: 5 }], disabled: [{ name: "ImageLocality" }] },
            score: { enabled: [{ name: "OutOfTreeScorer", weight: 2 }] },
          },
          pluginConfig: [
            { name: "VolumeBinding", args: typedArgs("VolumeBindingArgs", { bindTimeoutSeconds: 60 }) },
            { name: "OutOfTreeScorer", args: opaqueArgs({ mode: "aggressive" }) },
          ],
        },
        { schedulerName: "interactive" },
      ],
    };

    const once = structuredClone(setConfigurationDefaults(cfg));
    const twice = setConfigurationDefaults(cfg);

    expect(twice).toEqual(once);
  });

  it("should give every enabled plugin with a registered kind exactly one config entry", () => {
    const cfg = setConfigurationDefaults({
      profiles: [
        {
          plugins: { filter: { enabled: [{ name: "OutOfTreeFilter" }] } },
          pluginConfig: [{ name: "NodeAffinity", args: typedArgs("NodeAffinityArgs") }],
        },
      ],
    });
    const scheme = defaultPluginArgsScheme();
    const profile = cfg.profiles?.[0];

    for (const name of pluginNames(profile?.plugins)) {
      const entries = profile?.pluginConfig?.filter((entry) => entry.name === name) ?? [];
      expect(entries).toHaveLength(scheme.has(argsKindFor(name)) ? 1 : 0);
    }
  });

  it("should not overwrite fields the operator set", () => {
    const cfg = setConfigurationDefaults({
      profiles: [
        {
          pluginConfig: [
            {
              name: "NodeResourcesBalancedAllocation",
              args: typedArgs("NodeResourcesBalancedAllocationArgs", {
                resources: [
                  { name: "cpu", weight: 0 },
                  { name: "memory", weight: 3 },
                ],
              }),
            },
            { name: "DefaultPreemption", args: typedArgs("DefaultPreemptionArgs", { minCandidateNodesPercentage: 25 }) },
          ],
        },
      ],
    });

    expect(argsOf(cfg, 0, "NodeResourcesBalancedAllocation")).toEqual({
      kind: "NodeResourcesBalancedAllocationArgs",
      apiVersion,
      resources: [
        { name: "cpu", weight: 1 },
        { name: "memory", weight: 3 },
      ],
    });
    expect(argsOf(cfg, 0, "DefaultPreemption")).toEqual({
      kind: "DefaultPreemptionArgs",
      apiVersion,
      minCandidateNodesPercentage: 25,
      minCandidateNodesAbsolute: 100,
    });
    expect(cfg.profiles?.[0].pluginConfig?.[0].name).toBe("NodeResourcesBalancedAllocation");
  });

  it("should default the VolumeBinding shape only when the feature gate is enabled", () => {
    const off = setConfigurationDefaults({}, { featureGate: new StaticFeatureGate() });
    expect(argsOf(off, 0, "VolumeBinding")).toEqual({ kind: "VolumeBindingArgs", apiVersion, bindTimeoutSeconds: 600 });

    const gate = new MutableFeatureGate();
    gate.set(`${Feature.VolumeCapacityPriority}=true`);
    const on = setConfigurationDefaults({}, { featureGate: gate });
    expect(argsOf(on, 0, "VolumeBinding")?.shape).toEqual([
      { utilization: 0, score: 0 },
      { utilization: 100, score: 10 },
    ]);
  });

  it("should use the injected merge collaborator", () => {
    const merge = passthroughMerger();
    const cfg = setConfigurationDefaults({ profiles: [{}, { plugins: { bind: { enabled: [{ name: "DefaultBinder" }] } } }] }, { merge });

    expect(merge.calls).toBe(2);
    expect(cfg.profiles?.[0].plugins).toEqual({});
    expect(cfg.profiles?.[0].pluginConfig).toEqual([]);
    expect(cfg.profiles?.[1].plugins).toEqual({ bind: { enabled: [{ name: "DefaultBinder" }] } });
  });

  it("should propagate merge failures unchanged", () => {
    const failure = new Error("conflicting plugin sets");
    const cfg: KubeSchedulerConfiguration = { profiles: [{ schedulerName: "a" }] };

    expect(() =>
      setConfigurationDefaults(cfg, {
        merge: () => {
          throw failure;
        },
      }),
    ).toThrow(failure);
    expect(cfg.podMaxBackoffSeconds).toBeUndefined();
  });

  it("should use a substituted defaults table", () => {
    const cfg = setConfigurationDefaults({}, { defaults: mergeDefaults({ parallelism: 4, schedulerName: "test-scheduler" }) });

    expect(cfg.parallelism).toBe(4);
    expect(cfg.profiles?.[0].schedulerName).toBe("test-scheduler");
  });
});
