/**
 * Loading and serializing KubeSchedulerConfiguration documents.
 *
 * Decoding is structural only: the document must have the right shape,
 * and plugin arguments are sorted into typed and opaque ones. Whether the
 * values make sense is left to validation.
 */

import fs from "node:fs";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import YAML from "yaml";
import { SCHEDULER_API_VERSION, SCHEDULER_CONFIGURATION_KIND } from "./config.js";
import { setConfigurationDefaults, type DefaultingOptions } from "./defaults/configuration.js";
import { EXTENSION_POINTS } from "./plugins/names.js";
import { defaultPluginArgsScheme, type PluginArgsScheme } from "./registry/scheme.js";
import type { KubeSchedulerConfiguration, KubeSchedulerProfile, PluginSet, Plugins } from "./types.js";

export type ConfigFormat = "yaml" | "json";

export class ConfigLoadError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigLoadError";
  }
}

const PluginSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  weight: Type.Optional(Type.Integer()),
});

const PluginSetSchema = Type.Object({
  enabled: Type.Optional(Type.Array(PluginSchema)),
  disabled: Type.Optional(Type.Array(PluginSchema)),
});

const PluginsSchema = Type.Object({
  multiPoint: Type.Optional(PluginSetSchema),
  preFilter: Type.Optional(PluginSetSchema),
  filter: Type.Optional(PluginSetSchema),
  postFilter: Type.Optional(PluginSetSchema),
  reserve: Type.Optional(PluginSetSchema),
  preScore: Type.Optional(PluginSetSchema),
  score: Type.Optional(PluginSetSchema),
  preBind: Type.Optional(PluginSetSchema),
  bind: Type.Optional(PluginSetSchema),
  postBind: Type.Optional(PluginSetSchema),
  permit: Type.Optional(PluginSetSchema),
  queueSort: Type.Optional(PluginSetSchema),
});

const ProfileSchema = Type.Object({
  schedulerName: Type.Optional(Type.String()),
  plugins: Type.Optional(PluginsSchema),
  pluginConfig: Type.Optional(
    Type.Array(
      Type.Object({
        name: Type.String({ minLength: 1 }),
        args: Type.Optional(Type.Unknown()),
      }),
    ),
  ),
});

export const ConfigDocumentSchema = Type.Object({
  apiVersion: Type.Optional(Type.String()),
  kind: Type.Optional(Type.String()),
  parallelism: Type.Optional(Type.Integer()),
  profiles: Type.Optional(Type.Array(ProfileSchema)),
  percentageOfNodesToScore: Type.Optional(Type.Integer()),
  leaderElection: Type.Optional(
    Type.Object({
      leaderElect: Type.Optional(Type.Boolean()),
      leaseDuration: Type.Optional(Type.String()),
      renewDeadline: Type.Optional(Type.String()),
      retryPeriod: Type.Optional(Type.String()),
      resourceLock: Type.Optional(Type.String()),
      resourceName: Type.Optional(Type.String()),
      resourceNamespace: Type.Optional(Type.String()),
    }),
  ),
  clientConnection: Type.Optional(
    Type.Object({
      kubeconfig: Type.Optional(Type.String()),
      acceptContentTypes: Type.Optional(Type.String()),
      contentType: Type.Optional(Type.String()),
      qps: Type.Optional(Type.Number()),
      burst: Type.Optional(Type.Integer()),
    }),
  ),
  podInitialBackoffSeconds: Type.Optional(Type.Integer()),
  podMaxBackoffSeconds: Type.Optional(Type.Integer()),
  enableProfiling: Type.Optional(Type.Boolean()),
  enableContentionProfiling: Type.Optional(Type.Boolean()),
  extenders: Type.Optional(Type.Array(Type.Unknown())),
});
type ConfigDocument = Static<typeof ConfigDocumentSchema>;
type ProfileDocument = Static<typeof ProfileSchema>;

export function detectFormat(filePath: string): ConfigFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
}

function parseText(text: string, format: ConfigFormat, source?: string): unknown {
  try {
    return format === "json" ? JSON.parse(text) : YAML.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`could not parse ${format}: ${message}`, source);
  }
}

// An explicit null reads as unset. Plugin args are kept as written.
function dropNullFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => dropNullFields(item));
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  const fields: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (field !== null) {
      fields[key] = key === "args" ? field : dropNullFields(field);
    }
  }
  return fields;
}

function toProfile(doc: ProfileDocument, scheme: PluginArgsScheme): KubeSchedulerProfile {
  const profile: KubeSchedulerProfile = {};
  if (doc.schedulerName !== undefined) {
    profile.schedulerName = doc.schedulerName;
  }
  if (doc.plugins !== undefined) {
    profile.plugins = doc.plugins;
  }
  if (doc.pluginConfig !== undefined) {
    profile.pluginConfig = doc.pluginConfig.map((entry) => ({
      name: entry.name,
      args: scheme.decode(entry.name, entry.args),
    }));
  }
  return profile;
}

function toConfiguration(doc: ConfigDocument, scheme: PluginArgsScheme): KubeSchedulerConfiguration {
  const { profiles, ...rest } = doc;
  const cfg: KubeSchedulerConfiguration = { ...rest };
  if (profiles !== undefined) {
    cfg.profiles = profiles.map((profile) => toProfile(profile, scheme));
  }
  return cfg;
}

/**
 * Parse a configuration document. An empty document is an empty configuration.
 */
export function parseConfiguration(
  text: string,
  format: ConfigFormat = "yaml",
  scheme: PluginArgsScheme = defaultPluginArgsScheme(),
  source?: string,
): KubeSchedulerConfiguration {
  const parsed = dropNullFields(parseText(text, format, source) ?? {});

  if (!Value.Check(ConfigDocumentSchema, parsed)) {
    const first = Value.Errors(ConfigDocumentSchema, parsed).First();
    const where = first && first.path ? first.path : "/";
    throw new ConfigLoadError(`invalid document at ${where}: ${first ? first.message : "unexpected shape"}`, source);
  }
  if (parsed.kind !== undefined && parsed.kind !== SCHEDULER_CONFIGURATION_KIND) {
    throw new ConfigLoadError(`unexpected kind "${parsed.kind}", expected ${SCHEDULER_CONFIGURATION_KIND}`, source);
  }
  if (parsed.apiVersion !== undefined && parsed.apiVersion !== SCHEDULER_API_VERSION) {
    throw new ConfigLoadError(`unsupported apiVersion "${parsed.apiVersion}"`, source);
  }

  return toConfiguration(parsed, scheme);
}

export async function loadConfigurationFile(
  filePath: string,
  scheme: PluginArgsScheme = defaultPluginArgsScheme(),
): Promise<KubeSchedulerConfiguration> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`could not read file: ${message}`, filePath);
  }
  return parseConfiguration(text, detectFormat(filePath), scheme, filePath);
}

/**
 * Load a file and run the defaulting pass with one shared scheme.
 */
export async function loadAndDefault(
  filePath: string,
  options: DefaultingOptions = {},
): Promise<KubeSchedulerConfiguration> {
  const scheme = options.scheme ?? defaultPluginArgsScheme(options.featureGate);
  const cfg = await loadConfigurationFile(filePath, scheme);
  return setConfigurationDefaults(cfg, { ...options, scheme });
}

// Empty lists are omitted, matching how the document is usually written.
function pluginSetDocument(set: PluginSet): PluginSet {
  const doc: PluginSet = {};
  if (set.enabled && set.enabled.length > 0) {
    doc.enabled = set.enabled;
  }
  if (set.disabled && set.disabled.length > 0) {
    doc.disabled = set.disabled;
  }
  return doc;
}

function pluginsDocument(plugins: Plugins): Plugins {
  const doc: Plugins = {};
  for (const point of EXTENSION_POINTS) {
    const set = plugins[point];
    if (set) {
      doc[point] = pluginSetDocument(set);
    }
  }
  return doc;
}

/**
 * Plain document form of a configuration: typed arguments become their
 * objects and opaque arguments are written back as they were read.
 */
export function toDocument(cfg: KubeSchedulerConfiguration): Record<string, unknown> {
  const { apiVersion, kind, profiles, ...rest } = cfg;
  return {
    apiVersion: apiVersion ?? SCHEDULER_API_VERSION,
    kind: kind ?? SCHEDULER_CONFIGURATION_KIND,
    ...rest,
    profiles: profiles?.map((profile) => ({
      schedulerName: profile.schedulerName,
      plugins: profile.plugins ? pluginsDocument(profile.plugins) : undefined,
      pluginConfig: profile.pluginConfig?.map((entry) => ({
        name: entry.name,
        args: entry.args.type === "typed" ? entry.args.object : entry.args.raw,
      })),
    })),
  };
}

export function serializeConfiguration(cfg: KubeSchedulerConfiguration, format: ConfigFormat = "yaml"): string {
  const doc = toDocument(cfg);
  return format === "json" ? JSON.stringify(doc, null, 2) + "\n" : YAML.stringify(doc);
}
