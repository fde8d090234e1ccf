/**
 * In-tree plugin names and the built-in default plugin set.
 */

import type { Plugins } from "../types.js";

export const PluginName = {
  PrioritySort: "PrioritySort",
  NodeUnschedulable: "NodeUnschedulable",
  NodeName: "NodeName",
  TaintToleration: "TaintToleration",
  NodeAffinity: "NodeAffinity",
  NodePorts: "NodePorts",
  NodeResourcesFit: "NodeResourcesFit",
  VolumeRestrictions: "VolumeRestrictions",
  EBSLimits: "EBSLimits",
  GCEPDLimits: "GCEPDLimits",
  NodeVolumeLimits: "NodeVolumeLimits",
  AzureDiskLimits: "AzureDiskLimits",
  VolumeBinding: "VolumeBinding",
  VolumeZone: "VolumeZone",
  PodTopologySpread: "PodTopologySpread",
  InterPodAffinity: "InterPodAffinity",
  DefaultPreemption: "DefaultPreemption",
  NodeResourcesBalancedAllocation: "NodeResourcesBalancedAllocation",
  ImageLocality: "ImageLocality",
  DefaultBinder: "DefaultBinder",
} as const;

export type InTreePluginName = (typeof PluginName)[keyof typeof PluginName];

/**
 * The default plugin set. Everything is enabled at multiPoint; the framework
 * expands each plugin to the extension points it implements.
 * Returns a fresh object on every call.
 */
export function getDefaultPlugins(): Plugins {
  return {
    multiPoint: {
      enabled: [
        { name: PluginName.PrioritySort },
        { name: PluginName.NodeUnschedulable },
        { name: PluginName.NodeName },
        { name: PluginName.TaintToleration, weight: 3 },
        { name: PluginName.NodeAffinity, weight: 2 },
        { name: PluginName.NodePorts },
        { name: PluginName.NodeResourcesFit, weight: 1 },
        { name: PluginName.VolumeRestrictions },
        { name: PluginName.EBSLimits },
        { name: PluginName.GCEPDLimits },
        { name: PluginName.NodeVolumeLimits },
        { name: PluginName.AzureDiskLimits },
        { name: PluginName.VolumeBinding },
        { name: PluginName.VolumeZone },
        { name: PluginName.PodTopologySpread, weight: 2 },
        { name: PluginName.InterPodAffinity, weight: 2 },
        { name: PluginName.DefaultPreemption },
        { name: PluginName.NodeResourcesBalancedAllocation, weight: 1 },
        { name: PluginName.ImageLocality, weight: 1 },
        { name: PluginName.DefaultBinder },
      ],
    },
  };
}
