// Command-line argument parsing for vk-karstnsim

import { parseArgs, type ParseArgsConfig } from "node:util";
import { parseParameterOverrides } from "./config.js";
import type { AutoOrNumber, SimulationOverrides } from "./model.js";

export interface CliArgs {
  zipPath: string;
  outputPath: string;
  debug: boolean;
  debugDir: string;
  dryRun: boolean;
  verbose: boolean;
  paramsFile?: string;
  python?: string;
  overrides: SimulationOverrides;
}

export type ParsedCli = { help: true } | ({ help: false } & CliArgs);

export const USAGE = `Usage: vk-karstnsim [options] <export.zip>

Convert a Visual KARSYS export, run KarstNSim on it and write the network
in the Visual KARSYS import format.

Options:
  -o, --output <file>        Output file (default: output.txt)
  --debug                    Write the engine's input layers and output as
                             debug_*.txt files in KarstNSim's text format
                             (also on --dry-run)
  --debug-dir <dir>          Directory for debug files (default: .)
  --dry-run                  Convert and validate only, do not run the engine
  --params <file>            YAML or JSON file with simulation parameters
  --python <exe>             Python interpreter with pykarstnsim installed
                             (default: $KARSTNSIM_PYTHON or python3)
  --verbose                  Print debug log lines
  --help, -h                 Show this help

Simulation parameters (override config.json and --params):
  --name <text>
  --seed <int>
  --k-pts <int>
  --cohesion-factor <number>
  --n-sinks <int>
  --search-radius <number|auto>
  --inception-surface-constraint-weight <number>
  --max-inception-surface-distance <number|auto>
  --density-sampling-modifier <number>
  --r-min-pervious <number|auto>
  --r-min-impervious <number|auto>

Examples:
  vk-karstnsim export.zip
  vk-karstnsim export.zip -o network.txt --seed 7 --n-sinks 50
  vk-karstnsim export.zip --debug --debug-dir dumps --dry-run
`;

// --- Value conversion ---

export function toInteger(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value)) {
    throw new Error(`--${flag} expects an integer, got '${raw}'`);
  }
  return value;
}

export function toNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`--${flag} expects a number, got '${raw}'`);
  }
  return value;
}

export function toAutoOrNumber(flag: string, raw: string): AutoOrNumber {
  if (raw.toLowerCase() === "auto") return "auto";
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`--${flag} expects either 'auto' or a number, got '${raw}'`);
  }
  return value;
}

type Converter = (flag: string, raw: string) => string | number | AutoOrNumber;

const PARAMETER_FLAGS: Record<string, [keyof SimulationOverrides, Converter]> = {
  name: ["name", (_, raw) => raw],
  seed: ["seed", toInteger],
  "k-pts": ["kPts", toInteger],
  "cohesion-factor": ["cohesionFactor", toNumber],
  "n-sinks": ["nSinks", toInteger],
  "search-radius": ["searchRadius", toAutoOrNumber],
  "inception-surface-constraint-weight": ["inceptionSurfaceConstraintWeight", toNumber],
  "max-inception-surface-distance": ["maxInceptionSurfaceDistance", toAutoOrNumber],
  "density-sampling-modifier": ["densitySamplingModifier", toNumber],
  "r-min-pervious": ["rMinPervious", toAutoOrNumber],
  "r-min-impervious": ["rMinImpervious", toAutoOrNumber],
};

const NEGATIVE_NUMBER = /^-(\d|\.\d)/;

// parseArgs reads "-5" as an option, so a negative value is bound to its flag as --flag=-5
function bindNegativeValues(argv: string[]): string[] {
  const bound: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (
      arg.startsWith("--") &&
      Object.hasOwn(PARAMETER_FLAGS, arg.slice(2)) &&
      next !== undefined &&
      NEGATIVE_NUMBER.test(next)
    ) {
      bound.push(`${arg}=${next}`);
      i++;
    } else {
      bound.push(arg);
    }
  }
  return bound;
}

/** Throws on unknown options, bad values, or a missing or non-.zip input path. */
export function parseCliArgs(argv: string[]): ParsedCli {
  const options: NonNullable<ParseArgsConfig["options"]> = {
    output: { type: "string", short: "o", default: "output.txt" },
    debug: { type: "boolean", default: false },
    "debug-dir": { type: "string", default: "." },
    "dry-run": { type: "boolean", default: false },
    params: { type: "string" },
    python: { type: "string" },
    verbose: { type: "boolean", default: false },
    help: { type: "boolean", default: false, short: "h" },
  };
  for (const flag of Object.keys(PARAMETER_FLAGS)) {
    options[flag] = { type: "string" };
  }
  const { values, positionals } = parseArgs({
    args: bindNegativeValues(argv),
    options,
    allowPositionals: true,
    strict: true,
  });

  if (values.help === true) return { help: true };

  const zipPath = positionals[0];
  if (!zipPath) throw new Error("Missing input ZIP file");
  if (positionals.length > 1) {
    throw new Error(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
  }
  if (!zipPath.toLowerCase().endsWith(".zip")) {
    throw new Error(`The file ${zipPath} is not a ZIP file.`);
  }

  const overrides: Record<string, unknown> = {};
  for (const [flag, [key, convert]] of Object.entries(PARAMETER_FLAGS)) {
    const raw = values[flag];
    if (typeof raw === "string") overrides[key] = convert(flag, raw);
  }

  const str = (v: unknown): string | undefined => (typeof v === "string" ? v : undefined);

  return {
    help: false,
    zipPath,
    outputPath: str(values.output) ?? "output.txt",
    debug: values.debug === true,
    debugDir: str(values["debug-dir"]) ?? ".",
    dryRun: values["dry-run"] === true,
    verbose: values.verbose === true,
    paramsFile: str(values.params),
    python: str(values.python),
    overrides: parseParameterOverrides(overrides, "command line"),
  };
}
