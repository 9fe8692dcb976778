// Bridge pipeline: read, validate, convert, run the engine, write the output

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createRandom } from "./geometry.js";
import { silentLogger, type Logger } from "./log.js";
import { readArchive } from "./parser.js";
import { buildProjectBox, mapRanksToUnits } from "./projectBox.js";
import { formatRunOutput } from "./serializer.js";
import { placeSinks } from "./sinks.js";
import { buildSprings, orderWaterTables } from "./springs.js";
import { buildWaterTables, demToSurface, normalizeDem } from "./surface.js";
import { buildEngineConfig, type KarstEngine } from "./engine.js";
import { validateProject } from "./validator.js";
import type {
  ComputeResolution,
  EngineInput,
  EngineResult,
  SimulationOverrides,
  VkProject,
} from "./model.js";

export interface BridgeOptions {
  /** Defaults to output.txt */
  outputPath?: string;
  debug?: boolean;
  /** Where debug dumps go; defaults to the working directory. Dumps are written by the engine. */
  debugDir?: string;
  /** Stop before the engine call; no output file is written */
  dryRun?: boolean;
  overrides?: SimulationOverrides[];
  engine?: KarstEngine;
  logger?: Logger;
}

export interface BridgeRun {
  project: VkProject;
  input: EngineInput;
  result: EngineResult | null;
  outputPath: string | null;
  debugPaths: string[];
}

export function computeResolution(project: VkProject): ComputeResolution {
  const { nx, ny, nz } = project.voxels.header;
  return { x: nx, y: ny, z: nz };
}

/**
 * Validate a parsed export and convert it into engine input.
 * Throws with every validation error when the project is invalid.
 */
export function prepareEngineInput(
  project: VkProject,
  debug: boolean = false,
  logger: Logger = silentLogger
): EngineInput {
  const validation = validateProject(project);
  for (const w of validation.warnings) logger.warn(w);
  if (!validation.isValid) {
    throw new Error(`Invalid Visual KARSYS export:\n${validation.errors.join("\n")}`);
  }

  const params = project.parameters;
  const box = project.projectBox;
  const compute = computeResolution(project);

  const rankToUnit = mapRanksToUnits(project.stratigraphy, project.voxelsUnits, logger);
  const projectBox = buildProjectBox(box, project.voxels, rankToUnit, params, logger);

  const dem = normalizeDem(project.demValues, project.demResolution, compute, box);
  logger.info(`Resampled surface data to ${dem.nRows}x${dem.nCols}`);
  const topoSurface = demToSurface(dem);

  const waterTables = orderWaterTables(buildWaterTables(project.voxels, box, logger));
  const springs = buildSprings(
    project.springs,
    project.groundwaterBodies,
    waterTables.gwbIds
  );

  logger.info(`Loaded ${project.faults.length} inception surfaces.`);

  const rng = createRandom(params.seed);
  const { sinks, connectivityMatrix } = placeSinks(
    params.nSinks,
    project.springs,
    dem,
    rng,
    logger
  );

  const config = buildEngineConfig(params, box, compute, debug, logger);

  return {
    config,
    projectBox,
    topoSurface,
    waterTables: waterTables.surfaces,
    inceptionSurfaces: project.faults,
    springs,
    sinks,
    connectivityMatrix,
  };
}

export async function runBridge(
  source: string | Buffer,
  options: BridgeOptions = {}
): Promise<BridgeRun> {
  const {
    outputPath = "output.txt",
    debug = false,
    debugDir = ".",
    dryRun = false,
    overrides = [],
    engine,
    logger = silentLogger,
  } = options;

  const project = readArchive(source, { overrides, logger });
  const input = prepareEngineInput(project, debug, logger);

  logger.info(`Simulation configuration: ${JSON.stringify(project.parameters, null, 2)}`);

  if (!engine && (debug || !dryRun)) {
    throw new Error("No simulation engine configured");
  }

  const debugPaths: string[] = [];
  if (debug && engine) {
    await mkdir(debugDir, { recursive: true });
    debugPaths.push(...(await engine.dump(input, debugDir)));
    logger.info(`Wrote ${debugPaths.length} debug files to ${debugDir}`);
  }

  if (dryRun || !engine) {
    logger.info("Dry run, skipping the simulation");
    return { project, input, result: null, outputPath: null, debugPaths };
  }

  const compute = computeResolution(project);
  logger.info(`Starting simulation with size ${compute.x}x${compute.y}x${compute.z}`);

  const start = performance.now();
  const result = await engine.run(input);
  const runtimeS = (performance.now() - start) / 1000;
  const generationTime = new Date();

  logger.info(`Simulation completed successfully in ${runtimeS.toFixed(2)} seconds.`);
  logger.info(`Number of generated segments: ${result.segments}`);

  if (debug) {
    const path = join(debugDir, "debug_output.txt");
    await writeFile(path, result.network, "utf-8");
    debugPaths.push(path);
  }

  const text = formatRunOutput(
    { generationTime, generationDurationS: runtimeS, computeResolution: compute },
    project.parameters,
    result.network
  );
  await writeFile(outputPath, text, "utf-8");
  logger.info(`Results written to ${outputPath}`);

  return { project, input, result, outputPath, debugPaths };
}
