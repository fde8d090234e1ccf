/**
 * Shared builders and fakes for defaulting tests.
 */

import type { FeatureGate } from "../../src/features.js";
import type { PluginMerger } from "../../src/plugins/merge.js";
import type { PluginArgs, PluginArgsObject, Plugins } from "../../src/types.js";
import { SCHEDULER_API_VERSION } from "../../src/config.js";

/**
 * Feature gate with a fixed answer per feature; unknown features are off.
 */
export class StaticFeatureGate implements FeatureGate {
  readonly queried: string[] = [];

  constructor(private values: Record<string, boolean> = {}) {}

  enabled(name: string): boolean {
    this.queried.push(name);
    return this.values[name] ?? false;
  }
}

export function typedArgs(kind: string, fields: Record<string, unknown> = {}): PluginArgs {
  const object: PluginArgsObject = { ...fields, kind, apiVersion: SCHEDULER_API_VERSION };
  return { type: "typed", object };
}

export function opaqueArgs(raw: unknown): PluginArgs {
  return { type: "opaque", raw };
}

/** Enabled-only plugin pipeline at a single extension point. */
export function enabledAt(point: keyof Plugins, ...names: string[]): Plugins {
  const plugins: Plugins = {};
  plugins[point] = { enabled: names.map((name) => ({ name })) };
  return plugins;
}

export type RecordingMerger = PluginMerger & { calls: number };

/**
 * Merger that returns the custom plugins unchanged (or nothing) and
 * records every call.
 */
export function passthroughMerger(): RecordingMerger {
  const merger: RecordingMerger = Object.assign(
    (_defaults: Plugins, custom: Plugins | undefined): Plugins => {
      merger.calls++;
      return custom ?? {};
    },
    { calls: 0 },
  );
  return merger;
}
