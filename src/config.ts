// Simulation parameters: defaults, archive config.json, parameter files, CLI overrides

import { readFileSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import type { SimulationOverrides, SimulationParameters } from "./model.js";

export const DEFAULT_PARAMETERS: SimulationParameters = {
  name: "Karst Network",
  seed: 42,
  kPts: 10,
  cohesionFactor: 0.9,
  nSinks: 100,
  searchRadius: "auto",
  inceptionSurfaceConstraintWeight: 1.0,
  maxInceptionSurfaceDistance: "auto",
  densitySamplingModifier: 2.0,
  rMinPervious: "auto",
  rMinImpervious: "auto",
};

// --- Key normalization ---

/** "k_pts" and "k-pts" become "kPts"; camelCase keys are left alone. */
export function toCamelCase(key: string): string {
  return key.replace(/[-_]+([a-zA-Z0-9])/g, (_, c: string) => c.toUpperCase());
}

export function camelizeKeys(value: unknown): unknown {
  if (!value || typeof value !== "object" || Array.isArray(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[toCamelCase(k)] = v;
  }
  return out;
}

// --- Schemas ---

export const autoOrNumber = z.union([z.literal("auto"), z.number()]);

const parameterShape = {
  name: z.string().min(1),
  seed: z.number().int(),
  kPts: z.number().int(),
  cohesionFactor: z.number(),
  nSinks: z.number().int(),
  searchRadius: autoOrNumber,
  inceptionSurfaceConstraintWeight: z.number(),
  maxInceptionSurfaceDistance: autoOrNumber,
  densitySamplingModifier: z.number(),
  rMinPervious: autoOrNumber,
  rMinImpervious: autoOrNumber,
};

/** Lenient: unknown keys in an exported config.json are dropped. */
const ArchiveParametersSchema = z.preprocess(
  camelizeKeys,
  z.object(parameterShape).partial()
);

/** Strict: a typo in a hand-written parameter file is an error. */
const ParameterFileSchema = z.preprocess(
  camelizeKeys,
  z.object(parameterShape).partial().strict()
);

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/** Parse the archive's config.json on top of the defaults. */
export function parseArchiveParameters(raw: unknown): SimulationParameters {
  const result = ArchiveParametersSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid config.json: ${formatIssues(result.error)}`);
  }
  return mergeParameters(DEFAULT_PARAMETERS, result.data);
}

export function parseParameterOverrides(
  raw: unknown,
  source: string
): SimulationOverrides {
  const result = ParameterFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid parameters in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load a YAML or JSON parameter file. Keys may be camelCase, snake_case or
 * kebab-case.
 */
export function loadParameterFile(filePath: string): SimulationOverrides {
  const raw = readFileSync(filePath, "utf-8");
  const data = yaml.load(raw, { schema: yaml.DEFAULT_SCHEMA });
  if (data === null || data === undefined) return {};
  if (typeof data !== "object" || Array.isArray(data)) {
    throw new Error(`Invalid parameter file structure in: ${filePath}`);
  }
  return parseParameterOverrides(data, filePath);
}

export function mergeParameters(
  base: SimulationParameters,
  ...overrides: SimulationOverrides[]
): SimulationParameters {
  const merged: SimulationParameters = { ...base };
  for (const layer of overrides) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

// --- Environment ---

const EnvSchema = z.object({
  KARSTNSIM_PYTHON: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined)),
});

export interface BridgeEnv {
  pythonExecutable: string;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): BridgeEnv {
  const parsed = EnvSchema.parse(env);
  return { pythonExecutable: parsed.KARSTNSIM_PYTHON ?? "python3" };
}
