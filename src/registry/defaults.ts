/**
 * Default-filling routines for in-tree plugin arguments.
 * Each routine only assigns fields that are unset (undefined, or an empty
 * list where the field is a list).
 */

import { Feature, type FeatureGate } from "../features.js";
import {
  PodTopologySpreadDefaulting,
  ScoringStrategyType,
  type DefaultPreemptionArgs,
  type InterPodAffinityArgs,
  type NodeResourcesBalancedAllocationArgs,
  type NodeResourcesFitArgs,
  type PodTopologySpreadArgs,
  type ResourceSpec,
  type VolumeBindingArgs,
} from "./args.js";

/** Highest score a custom priority function may return. */
export const MAX_CUSTOM_PRIORITY_SCORE = 10;

export interface DefaultingContext {
  featureGate: FeatureGate;
}

/** A fresh copy each call; callers may mutate the result. */
export function defaultResourceSpec(): ResourceSpec[] {
  return [
    { name: "cpu", weight: 1 },
    { name: "memory", weight: 1 },
  ];
}

// A null or zero weight counts as unset.
function normalizeWeights(resources: ResourceSpec[]): void {
  for (const resource of resources) {
    if (!resource.weight) {
      resource.weight = 1;
    }
  }
}

export function setDefaultPreemptionArgsDefaults(obj: DefaultPreemptionArgs): void {
  if (obj.minCandidateNodesPercentage === undefined) {
    obj.minCandidateNodesPercentage = 10;
  }
  if (obj.minCandidateNodesAbsolute === undefined) {
    obj.minCandidateNodesAbsolute = 100;
  }
}

export function setInterPodAffinityArgsDefaults(obj: InterPodAffinityArgs): void {
  if (obj.hardPodAffinityWeight === undefined) {
    obj.hardPodAffinityWeight = 1;
  }
}

export function setVolumeBindingArgsDefaults(obj: VolumeBindingArgs, ctx: DefaultingContext): void {
  if (obj.bindTimeoutSeconds === undefined) {
    obj.bindTimeoutSeconds = 600;
  }
  if ((obj.shape ?? []).length === 0 && ctx.featureGate.enabled(Feature.VolumeCapacityPriority)) {
    obj.shape = [
      { utilization: 0, score: 0 },
      { utilization: 100, score: MAX_CUSTOM_PRIORITY_SCORE },
    ];
  }
}

export function setNodeResourcesBalancedAllocationArgsDefaults(obj: NodeResourcesBalancedAllocationArgs): void {
  if (!obj.resources || obj.resources.length === 0) {
    obj.resources = defaultResourceSpec();
    return;
  }
  normalizeWeights(obj.resources);
}

export function setPodTopologySpreadArgsDefaults(obj: PodTopologySpreadArgs): void {
  if (!obj.defaultingType) {
    obj.defaultingType = PodTopologySpreadDefaulting.System;
  }
}

export function setNodeResourcesFitArgsDefaults(obj: NodeResourcesFitArgs): void {
  const strategy = obj.scoringStrategy ?? {
    type: ScoringStrategyType.LeastAllocated,
    resources: defaultResourceSpec(),
  };
  obj.scoringStrategy = strategy;

  if (!strategy.resources || strategy.resources.length === 0) {
    strategy.resources = defaultResourceSpec();
  }
  normalizeWeights(strategy.resources);
}
