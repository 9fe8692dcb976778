// KarstNSim engine adapter
// Builds the engine configuration and hands the converted project to the
// Python bindings in a child process.

import { spawn } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { formatIssues } from "./config.js";
import { silentLogger, type Logger } from "./log.js";
import { boxDepth } from "./surface.js";
import type {
  ComputeResolution,
  EngineConfig,
  EngineInput,
  EngineResult,
  EngineSink,
  EngineSpring,
  SimulationParameters,
  TriangleSurface,
  VkProjectBox,
} from "./model.js";

export interface KarstEngine {
  run(input: EngineInput): Promise<EngineResult>;
  /** Write every input layer into dir in the engine's own text format; returns the paths. */
  dump(input: EngineInput, dir: string): Promise<string[]>;
}

// --- Configuration ---

/** Three times the largest cell edge, used for every "auto" distance. */
export function autoDistance(box: VkProjectBox, compute: ComputeResolution): number {
  const maxCell = Math.max(
    box.width / compute.x,
    box.height / compute.y,
    boxDepth(box) / compute.z
  );
  return maxCell * 3.0;
}

export function buildEngineConfig(
  params: SimulationParameters,
  box: VkProjectBox,
  compute: ComputeResolution,
  debug: boolean,
  logger: Logger = silentLogger
): EngineConfig {
  const auto = autoDistance(box, compute);

  let nghbRadius: number;
  if (params.searchRadius === "auto") {
    nghbRadius = auto;
    logger.info(`Auto-setting neighbor search radius to ${nghbRadius.toFixed(2)}`);
  } else {
    nghbRadius = params.searchRadius;
  }

  let maxInceptionSurfaceDistance: number;
  if (params.maxInceptionSurfaceDistance === "auto") {
    maxInceptionSurfaceDistance = auto;
    logger.info(
      `Auto-setting max inception surface distance to ${maxInceptionSurfaceDistance.toFixed(2)}`
    );
  } else {
    maxInceptionSurfaceDistance = params.maxInceptionSurfaceDistance;
  }

  return {
    karsticNetworkName: params.name,
    selectedSeed: params.seed,
    kPts: params.kPts,
    fractionKarstPerm: params.cohesionFactor,
    nghbRadius,
    useMaxNghbRadius: true,
    inceptionSurfaceConstraintWeight: params.inceptionSurfaceConstraintWeight,
    maxInceptionSurfaceDistance,
    refineSurfaceSampling: 1,
    useKarstificationPotential: true,
    karstificationPotentialWeight: 1.0,
    nbDeadendPoints: 0,
    createVsetSampling: debug,
  };
}

// --- Wire payload for the Python runner ---

function surfacePayload(s: TriangleSurface) {
  return { vertices: s.vertices, triangles: s.triangles };
}

function springPayload(s: EngineSpring) {
  return {
    origin: s.origin,
    index: s.index,
    water_table_index: s.waterTableIndex,
    radius: s.radius,
  };
}

function sinkPayload(s: EngineSink) {
  return { origin: s.origin, index: s.index, order: s.order, radius: s.radius };
}

/** Engine input with KarstConfig attribute names, as the runner script expects. */
export function toEnginePayload(input: EngineInput): Record<string, unknown> {
  const c = input.config;
  const pb = input.projectBox;
  return {
    config: {
      karstic_network_name: c.karsticNetworkName,
      selected_seed: c.selectedSeed,
      k_pts: c.kPts,
      fraction_karst_perm: c.fractionKarstPerm,
      nghb_radius: c.nghbRadius,
      use_max_nghb_radius: c.useMaxNghbRadius,
      inception_surface_constraint_weight: c.inceptionSurfaceConstraintWeight,
      max_inception_surface_distance: c.maxInceptionSurfaceDistance,
      refine_surface_sampling: c.refineSurfaceSampling,
      use_karstification_potential: c.useKarstificationPotential,
      karstification_potential_weight: c.karstificationPotentialWeight,
      nb_deadend_points: c.nbDeadendPoints,
      create_vset_sampling: c.createVsetSampling,
    },
    project_box: {
      basis: pb.basis,
      u: pb.u,
      v: pb.v,
      w: pb.w,
      nu: pb.cellsU,
      nv: pb.cellsV,
      nw: pb.cellsW,
      densities: pb.densities,
      karstification_potential: pb.karstificationPotential,
    },
    topo_surface: surfacePayload(input.topoSurface),
    water_tables: input.waterTables.map(surfacePayload),
    inception_surfaces: input.inceptionSurfaces.map(surfacePayload),
    springs: input.springs.map(springPayload),
    sinks: input.sinks.map(sinkPayload),
    connectivity_matrix: input.connectivityMatrix,
  };
}

const EngineResultSchema = z
  .object({
    segments: z.number().int().nonnegative(),
    network: z.string(),
  })
  .nullable();

export function parseEngineResult(raw: unknown): EngineResult {
  const result = EngineResultSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Malformed engine result: ${formatIssues(result.error)}`);
  }
  if (result.data === null) {
    throw new Error("Simulation failed, no result returned.");
  }
  return result.data;
}

// --- Python runner ---

export const RUNNER_SCRIPT = fileURLToPath(
  new URL("../python/run_karstnsim.py", import.meta.url)
);

const STDERR_TAIL_LINES = 20;

export interface PythonKarstEngineOptions {
  python: string;
  script?: string;
  logger?: Logger;
}

const DumpResultSchema = z.array(z.string().min(1));

function parseDumpResult(raw: unknown): string[] {
  const result = DumpResultSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Malformed engine dump listing: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Keeps the last `size` complete lines of a chunked stream. */
class LineTail {
  private readonly lines: string[] = [];
  private pending = "";

  constructor(private readonly size: number) {}

  push(chunk: string): void {
    const parts = (this.pending + chunk).split(/\r?\n/);
    this.pending = parts.pop() ?? "";
    for (const line of parts) this.keep(line);
  }

  text(): string {
    if (this.pending !== "") {
      this.keep(this.pending);
      this.pending = "";
    }
    return this.lines.join("\n").trimEnd();
  }

  private keep(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.size) this.lines.shift();
  }
}

/** Runs KarstNSim through its Python bindings in a child process. */
export class PythonKarstEngine implements KarstEngine {
  private readonly python: string;
  private readonly script: string;
  private readonly logger: Logger;

  constructor(options: PythonKarstEngineOptions) {
    this.python = options.python;
    this.script = options.script ?? RUNNER_SCRIPT;
    this.logger = options.logger ?? silentLogger;
  }

  run(input: EngineInput): Promise<EngineResult> {
    return this.invoke(
      input,
      (inputPath, resultPath) => [this.script, inputPath, resultPath],
      parseEngineResult
    );
  }

  async dump(input: EngineInput, dir: string): Promise<string[]> {
    const names = await this.invoke(
      input,
      (inputPath, resultPath) => [this.script, "--dump", inputPath, resultPath, dir],
      parseDumpResult
    );
    return names.map((name) => join(dir, name));
  }

  private async invoke<T>(
    input: EngineInput,
    args: (inputPath: string, resultPath: string) => string[],
    parse: (raw: unknown) => T
  ): Promise<T> {
    const workDir = await mkdtemp(join(tmpdir(), "vk-karstnsim-"));
    try {
      const inputPath = join(workDir, "input.json");
      const resultPath = join(workDir, "result.json");
      await writeFile(inputPath, JSON.stringify(toEnginePayload(input)), "utf-8");

      await this.spawnRunner(args(inputPath, resultPath));

      let text: string;
      try {
        text = await readFile(resultPath, "utf-8");
      } catch {
        throw new Error("Simulation failed, the engine wrote no result.");
      }
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (err) {
        if (err instanceof SyntaxError) {
          throw new Error(`The KarstNSim runner wrote an invalid result.json: ${err.message}`);
        }
        throw err;
      }
      return parse(raw);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private spawnRunner(args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.python, args, { stdio: ["ignore", "pipe", "pipe"] });
      const stderr = new LineTail(STDERR_TAIL_LINES);

      child.stdout.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        for (const line of chunk.split(/\r?\n/)) {
          if (line.trim() !== "") this.logger.debug(`engine: ${line}`);
        }
      });
      child.stderr.setEncoding("utf-8");
      child.stderr.on("data", (chunk: string) => stderr.push(chunk));

      child.on("error", (err) => {
        reject(new Error(`Could not start ${this.python}: ${err.message}`));
      });
      child.on("close", (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const reason = signal ? `signal ${signal}` : `exit code ${code}`;
        const tail = stderr.text();
        const detail = tail.trim() ? `\n${tail}` : "";
        reject(new Error(`KarstNSim runner failed with ${reason}${detail}`));
      });
    });
  }
}
