/**
 * Argument schemas for the in-tree plugins that take configuration.
 * The schemas describe structure only; defaults are applied by the
 * functions in ./defaults.ts.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { SCHEDULER_API_VERSION } from "../config.js";

/** Suffix appended to a plugin name to form its arguments kind. */
export const ARGS_KIND_SUFFIX = "Args";

export function argsKindFor(pluginName: string): string {
  return pluginName + ARGS_KIND_SUFFIX;
}

function argsObject<K extends string, P extends Record<string, TSchema>>(kind: K, properties: P) {
  return Type.Object({
    kind: Type.Literal(kind),
    apiVersion: Type.Literal(SCHEDULER_API_VERSION),
    ...properties,
  });
}

// A blank weight reads as null and is defaulted like zero.
export const ResourceSpecSchema = Type.Object({
  name: Type.String(),
  weight: Type.Optional(Type.Union([Type.Integer(), Type.Null()])),
});
export type ResourceSpec = Static<typeof ResourceSpecSchema>;

export const UtilizationShapePointSchema = Type.Object({
  utilization: Type.Integer(),
  score: Type.Integer(),
});
export type UtilizationShapePoint = Static<typeof UtilizationShapePointSchema>;

export const ScoringStrategyType = {
  LeastAllocated: "LeastAllocated",
  MostAllocated: "MostAllocated",
  RequestedToCapacityRatio: "RequestedToCapacityRatio",
} as const;

export const ScoringStrategySchema = Type.Object({
  type: Type.Optional(Type.String()),
  resources: Type.Optional(Type.Array(ResourceSpecSchema)),
  requestedToCapacityRatio: Type.Optional(
    Type.Object({ shape: Type.Optional(Type.Array(UtilizationShapePointSchema)) }),
  ),
});
export type ScoringStrategy = Static<typeof ScoringStrategySchema>;

export const PodTopologySpreadDefaulting = {
  System: "System",
  List: "List",
} as const;

export const DefaultPreemptionArgsSchema = argsObject("DefaultPreemptionArgs", {
  minCandidateNodesPercentage: Type.Optional(Type.Integer()),
  minCandidateNodesAbsolute: Type.Optional(Type.Integer()),
});
export type DefaultPreemptionArgs = Static<typeof DefaultPreemptionArgsSchema>;

export const InterPodAffinityArgsSchema = argsObject("InterPodAffinityArgs", {
  hardPodAffinityWeight: Type.Optional(Type.Integer()),
  ignorePreferredTermsOfExistingPods: Type.Optional(Type.Boolean()),
});
export type InterPodAffinityArgs = Static<typeof InterPodAffinityArgsSchema>;

export const NodeAffinityArgsSchema = argsObject("NodeAffinityArgs", {
  addedAffinity: Type.Optional(Type.Unknown()),
});
export type NodeAffinityArgs = Static<typeof NodeAffinityArgsSchema>;

export const NodeResourcesBalancedAllocationArgsSchema = argsObject("NodeResourcesBalancedAllocationArgs", {
  resources: Type.Optional(Type.Array(ResourceSpecSchema)),
});
export type NodeResourcesBalancedAllocationArgs = Static<typeof NodeResourcesBalancedAllocationArgsSchema>;

export const NodeResourcesFitArgsSchema = argsObject("NodeResourcesFitArgs", {
  ignoredResources: Type.Optional(Type.Array(Type.String())),
  ignoredResourceGroups: Type.Optional(Type.Array(Type.String())),
  scoringStrategy: Type.Optional(ScoringStrategySchema),
});
export type NodeResourcesFitArgs = Static<typeof NodeResourcesFitArgsSchema>;

export const PodTopologySpreadArgsSchema = argsObject("PodTopologySpreadArgs", {
  defaultConstraints: Type.Optional(Type.Array(Type.Unknown())),
  defaultingType: Type.Optional(Type.String()),
});
export type PodTopologySpreadArgs = Static<typeof PodTopologySpreadArgsSchema>;

export const VolumeBindingArgsSchema = argsObject("VolumeBindingArgs", {
  bindTimeoutSeconds: Type.Optional(Type.Integer()),
  shape: Type.Optional(Type.Array(UtilizationShapePointSchema)),
});
export type VolumeBindingArgs = Static<typeof VolumeBindingArgsSchema>;
