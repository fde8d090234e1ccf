/**
 * PluginArgsScheme: explicit kind → (schema, defaulter) mapping.
 *
 * The scheme is filled before a defaulting pass (in-tree kinds by
 * defaultPluginArgsScheme, out-of-tree kinds by their own register calls)
 * and is only read while defaulting.
 */

import type { Static, TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SCHEDULER_API_VERSION } from "../config.js";
import { MutableFeatureGate, type FeatureGate } from "../features.js";
import type { PluginArgs, PluginArgsObject } from "../types.js";
import {
  DefaultPreemptionArgsSchema,
  InterPodAffinityArgsSchema,
  NodeAffinityArgsSchema,
  NodeResourcesBalancedAllocationArgsSchema,
  NodeResourcesFitArgsSchema,
  PodTopologySpreadArgsSchema,
  VolumeBindingArgsSchema,
  argsKindFor,
} from "./args.js";
import {
  setDefaultPreemptionArgsDefaults,
  setInterPodAffinityArgsDefaults,
  setNodeResourcesBalancedAllocationArgsDefaults,
  setNodeResourcesFitArgsDefaults,
  setPodTopologySpreadArgsDefaults,
  setVolumeBindingArgsDefaults,
  type DefaultingContext,
} from "./defaults.js";

export class SchemeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemeError";
  }
}

export interface ArgsKindRegistration<S extends TObject> {
  schema: S;
  /** Omitted for kinds that are registered but have nothing to default. */
  setDefaults?: (obj: Static<S>, ctx: DefaultingContext) => void;
}

interface KindEntry {
  create(): PluginArgsObject;
  matches(value: unknown): boolean;
  setDefaults(obj: PluginArgsObject): void;
}

export interface PluginArgsSchemeOptions {
  featureGate?: FeatureGate;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class PluginArgsScheme {
  private entries = new Map<string, KindEntry>();
  private ctx: DefaultingContext;

  constructor(options: PluginArgsSchemeOptions = {}) {
    this.ctx = { featureGate: options.featureGate ?? new MutableFeatureGate() };
  }

  /**
   * Register an argument kind. Kinds are registered once; a second
   * registration under the same name is rejected.
   */
  register<S extends TObject>(kind: string, registration: ArgsKindRegistration<S>): void {
    if (this.entries.has(kind)) {
      throw new SchemeError(`argument kind "${kind}" is already registered`);
    }

    const { schema, setDefaults } = registration;
    this.entries.set(kind, {
      create: () => {
        const zero: unknown = Value.Create(schema);
        return { ...(isRecord(zero) ? zero : {}), kind, apiVersion: SCHEDULER_API_VERSION };
      },
      matches: (value) => Value.Check(schema, value),
      setDefaults: (obj) => {
        // An object edited into a shape its kind does not describe is left for validation.
        if (setDefaults && Value.Check(schema, obj)) {
          setDefaults(obj, this.ctx);
        }
      },
    });
  }

  has(kind: string): boolean {
    return this.entries.has(kind);
  }

  kinds(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Zero-value instance of a kind, tagged with kind and apiVersion.
   * Returns null for unknown kinds: the plugin is out-of-tree or takes no arguments.
   */
  newObject(kind: string): PluginArgsObject | null {
    const entry = this.entries.get(kind);
    return entry ? entry.create() : null;
  }

  /**
   * Fill defaults in place. Objects of unregistered kinds are left as they are.
   */
  default(obj: PluginArgsObject): void {
    this.entries.get(obj.kind)?.setDefaults(obj);
  }

  /**
   * Turn a loosely typed args value into PluginArgs. The kind comes from the
   * value itself or, when absent, from the plugin name. Values of unknown
   * kinds, and values that do not fit their kind's schema, stay opaque.
   */
  decode(pluginName: string, raw: unknown): PluginArgs {
    const source = raw ?? {};
    if (!isRecord(source)) {
      return { type: "opaque", raw };
    }

    const kind = typeof source.kind === "string" ? source.kind : argsKindFor(pluginName);
    const entry = this.entries.get(kind);
    if (!entry) {
      return { type: "opaque", raw };
    }

    const object: PluginArgsObject = {
      ...source,
      kind,
      apiVersion: typeof source.apiVersion === "string" ? source.apiVersion : SCHEDULER_API_VERSION,
    };
    if (!entry.matches(object)) {
      return { type: "opaque", raw };
    }
    return { type: "typed", object };
  }
}

/**
 * Scheme holding every in-tree argument kind.
 */
export function defaultPluginArgsScheme(featureGate: FeatureGate = new MutableFeatureGate()): PluginArgsScheme {
  const scheme = new PluginArgsScheme({ featureGate });
  scheme.register("DefaultPreemptionArgs", {
    schema: DefaultPreemptionArgsSchema,
    setDefaults: setDefaultPreemptionArgsDefaults,
  });
  scheme.register("InterPodAffinityArgs", {
    schema: InterPodAffinityArgsSchema,
    setDefaults: setInterPodAffinityArgsDefaults,
  });
  scheme.register("NodeAffinityArgs", { schema: NodeAffinityArgsSchema });
  scheme.register("NodeResourcesBalancedAllocationArgs", {
    schema: NodeResourcesBalancedAllocationArgsSchema,
    setDefaults: setNodeResourcesBalancedAllocationArgsDefaults,
  });
  scheme.register("NodeResourcesFitArgs", {
    schema: NodeResourcesFitArgsSchema,
    setDefaults: setNodeResourcesFitArgsDefaults,
  });
  scheme.register("PodTopologySpreadArgs", {
    schema: PodTopologySpreadArgsSchema,
    setDefaults: setPodTopologySpreadArgsDefaults,
  });
  scheme.register("VolumeBindingArgs", {
    schema: VolumeBindingArgsSchema,
    setDefaults: setVolumeBindingArgsDefaults,
  });
  return scheme;
}
