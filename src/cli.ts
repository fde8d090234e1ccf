/**
 * scheduler-config command line.
 * Usage: scheduler-config [defaults <file> [--json] [--feature-gates=A=true]|plugins|kinds|features]
 */

import { LOG_PREFIX } from "./config.js";
import { MutableFeatureGate } from "./features.js";
import { loadAndDefault, serializeConfiguration, type ConfigFormat } from "./loader.js";
import { getDefaultPlugins } from "./plugins/registry.js";
import { defaultPluginArgsScheme } from "./registry/scheme.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const consoleIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const USAGE = [
  "Usage: scheduler-config <command>",
  "",
  "Commands:",
  "  defaults <file> [--json] [--feature-gates=Name=true,...]  Print the defaulted configuration",
  "  plugins                                                   Print the default plugin set",
  "  kinds                                                     List registered plugin argument kinds",
  "  features                                                  List known feature gates",
  "",
].join("\n");

interface DefaultsFlags {
  file?: string;
  format: ConfigFormat;
  featureGates: string[];
}

function parseDefaultsFlags(args: string[]): DefaultsFlags {
  const flags: DefaultsFlags = { format: "yaml", featureGates: [] };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--json") {
      flags.format = "json";
    } else if (arg.startsWith("--feature-gates=")) {
      flags.featureGates.push(arg.slice("--feature-gates=".length));
    } else if (arg === "--feature-gates") {
      const value = args[++i];
      if (value === undefined) {
        throw new Error("--feature-gates requires a value");
      }
      flags.featureGates.push(value);
    } else if (arg.startsWith("--")) {
      throw new Error(`unknown flag ${arg}`);
    } else if (flags.file === undefined) {
      flags.file = arg;
    } else {
      throw new Error(`unexpected argument ${arg}`);
    }
  }
  return flags;
}

async function printDefaults(args: string[], io: CliIO): Promise<void> {
  const flags = parseDefaultsFlags(args);
  if (!flags.file) {
    throw new Error("defaults requires a configuration file");
  }

  const featureGate = new MutableFeatureGate();
  for (const value of flags.featureGates) {
    featureGate.set(value);
  }

  const cfg = await loadAndDefault(flags.file, { featureGate });
  io.stdout(serializeConfiguration(cfg, flags.format));
}

/**
 * Run a command and return the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const [cmd = "", ...rest] = argv;
  const command = cmd.toLowerCase();

  try {
    switch (command) {
      case "defaults":
        await printDefaults(rest, io);
        return 0;
      case "plugins":
        io.stdout(serializePlugins());
        return 0;
      case "kinds":
        io.stdout(defaultPluginArgsScheme().kinds().join("\n") + "\n");
        return 0;
      case "features":
        io.stdout(new MutableFeatureGate().knownFeatures().join("\n") + "\n");
        return 0;
      case "":
      case "help":
      case "--help":
        io.stdout(USAGE);
        return 0;
      default:
        io.stderr(`${LOG_PREFIX} Unknown command "${cmd}".\n${USAGE}`);
        return 2;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.stderr(`${LOG_PREFIX} ${message}\n`);
    return 1;
  }
}

function serializePlugins(): string {
  const lines: string[] = [];
  for (const [point, set] of Object.entries(getDefaultPlugins())) {
    lines.push(`${point}:`);
    for (const plugin of set?.enabled ?? []) {
      lines.push(plugin.weight === undefined ? `  ${plugin.name}` : `  ${plugin.name} (weight ${plugin.weight})`);
    }
  }
  return lines.join("\n") + "\n";
}
