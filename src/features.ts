/**
 * Feature gates consulted while defaulting plugin arguments.
 * Gates are read when a defaulter runs, never cached by the defaulters.
 */

export const Feature = {
  /** Score nodes by volume capacity utilization in VolumeBinding. */
  VolumeCapacityPriority: "VolumeCapacityPriority",
} as const;

export type FeatureStage = "ALPHA" | "BETA" | "GA" | "DEPRECATED";

export interface FeatureSpec {
  default: boolean;
  preRelease: FeatureStage;
  lockToDefault?: boolean;
}

export const DEFAULT_FEATURE_SPECS: Readonly<Record<string, FeatureSpec>> = Object.freeze({
  [Feature.VolumeCapacityPriority]: { default: false, preRelease: "ALPHA" },
});

export interface FeatureGate {
  enabled(name: string): boolean;
}

const TRUE_VALUES = new Set(["1", "t", "T", "true", "TRUE", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "false", "FALSE", "False"]);

function parseBool(value: string): boolean | null {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return null;
}

export class MutableFeatureGate implements FeatureGate {
  private known = new Map<string, FeatureSpec>();
  private overrides = new Map<string, boolean>();

  constructor(specs: Readonly<Record<string, FeatureSpec>> = DEFAULT_FEATURE_SPECS) {
    this.add(specs);
  }

  /**
   * Register additional features. Re-registering a feature with the same
   * spec is allowed; a different spec is an error.
   */
  add(specs: Readonly<Record<string, FeatureSpec>>): void {
    for (const [name, spec] of Object.entries(specs)) {
      const existing = this.known.get(name);
      if (existing && !sameSpec(existing, spec)) {
        throw new Error(`feature gate "${name}" with different spec already exists`);
      }
      this.known.set(name, { ...spec });
    }
  }

  enabled(name: string): boolean {
    const spec = this.known.get(name);
    if (!spec) {
      throw new Error(`feature "${name}" is not registered in the feature gate`);
    }
    return this.overrides.get(name) ?? spec.default;
  }

  /**
   * Parse a comma-separated list in the --feature-gates flag format,
   * e.g. "VolumeCapacityPriority=true,Other=false".
   */
  set(value: string): void {
    const parsed: Record<string, boolean> = {};
    for (const item of value.split(",")) {
      const trimmed = item.trim();
      if (trimmed.length === 0) {
        continue;
      }
      const parts = trimmed.split("=");
      if (parts.length !== 2) {
        throw new Error(`missing bool value for ${trimmed}`);
      }
      const [key, raw] = parts;
      const enabled = parseBool(raw.trim());
      if (enabled === null) {
        throw new Error(`invalid value of ${key.trim()}=${raw.trim()}, expected a boolean`);
      }
      parsed[key.trim()] = enabled;
    }
    this.setFromMap(parsed);
  }

  /**
   * Apply overrides. Nothing is applied when any entry is rejected.
   */
  setFromMap(values: Record<string, boolean>): void {
    for (const [name, enabled] of Object.entries(values)) {
      const spec = this.known.get(name);
      if (!spec) {
        throw new Error(`unrecognized feature gate: ${name}`);
      }
      if (spec.lockToDefault && spec.default !== enabled) {
        throw new Error(`cannot set feature gate ${name} to ${enabled}, feature is locked to ${spec.default}`);
      }
    }
    for (const [name, enabled] of Object.entries(values)) {
      this.overrides.set(name, enabled);
    }
  }

  /** One line per feature, sorted, in flag help format. */
  knownFeatures(): string[] {
    return [...this.known.entries()]
      .filter(([, spec]) => spec.preRelease !== "GA")
      .map(([name, spec]) => `${name}=true|false (${spec.preRelease} - default=${spec.default})`)
      .sort();
  }
}

function sameSpec(a: FeatureSpec, b: FeatureSpec): boolean {
  return a.default === b.default
    && a.preRelease === b.preRelease
    && (a.lockToDefault ?? false) === (b.lockToDefault ?? false);
}
