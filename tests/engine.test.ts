import { describe, it, expect } from "vitest";
import { existsSync, mkdtempSync, readdirSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_PARAMETERS, mergeParameters } from "../src/config.js";
import {
  PythonKarstEngine,
  RUNNER_SCRIPT,
  autoDistance,
  buildEngineConfig,
  parseEngineResult,
  toEnginePayload,
} from "../src/engine.js";
import { prepareEngineInput } from "../src/pipeline.js";
import { readArchive } from "../src/parser.js";
import { buildExport } from "./helpers.js";

const BOX = { width: 100, height: 100, minElevation: 0, maxElevation: 40 };
const COMPUTE = { x: 2, y: 2, z: 2 };

describe("autoDistance", () => {
  it("is three times the largest cell edge", () => {
    expect(autoDistance(BOX, COMPUTE)).toBe(150);
    expect(autoDistance({ ...BOX, maxElevation: 400 }, COMPUTE)).toBe(600);
  });
});

describe("buildEngineConfig", () => {
  it("resolves auto distances and fixed settings", () => {
    expect(buildEngineConfig(DEFAULT_PARAMETERS, BOX, COMPUTE, false)).toEqual({
      karsticNetworkName: "Karst Network",
      selectedSeed: 42,
      kPts: 10,
      fractionKarstPerm: 0.9,
      nghbRadius: 150,
      useMaxNghbRadius: true,
      inceptionSurfaceConstraintWeight: 1,
      maxInceptionSurfaceDistance: 150,
      refineSurfaceSampling: 1,
      useKarstificationPotential: true,
      karstificationPotentialWeight: 1,
      nbDeadendPoints: 0,
      createVsetSampling: false,
    });
  });

  it("keeps explicit distances and follows the debug flag", () => {
    const params = mergeParameters(DEFAULT_PARAMETERS, {
      searchRadius: 75,
      maxInceptionSurfaceDistance: 12.5,
    });
    const config = buildEngineConfig(params, BOX, COMPUTE, true);
    expect(config.nghbRadius).toBe(75);
    expect(config.maxInceptionSurfaceDistance).toBe(12.5);
    expect(config.createVsetSampling).toBe(true);
  });
});

describe("toEnginePayload", () => {
  it("uses the engine's attribute names", () => {
    const input = prepareEngineInput(readArchive(buildExport()));
    const payload = toEnginePayload(input);
    expect(Object.keys(payload).sort()).toEqual([
      "config",
      "connectivity_matrix",
      "inception_surfaces",
      "project_box",
      "sinks",
      "springs",
      "topo_surface",
      "water_tables",
    ]);
    expect(payload["springs"]).toEqual([
      { origin: [10, 10, 5], index: 1, water_table_index: 1, radius: 0 },
    ]);
    expect(payload["project_box"]).toMatchObject({ nu: 2, nv: 2, nw: 2, basis: [0, 0, 0] });
    expect(payload["config"]).toMatchObject({
      karstic_network_name: "Test Run",
      selected_seed: 7,
      nghb_radius: 150,
      create_vset_sampling: false,
    });
  });
});

describe("parseEngineResult", () => {
  it("accepts a result", () => {
    expect(parseEngineResult({ segments: 3, network: "a\nb" })).toEqual({
      segments: 3,
      network: "a\nb",
    });
  });

  it("treats null as a failed simulation", () => {
    expect(() => parseEngineResult(null)).toThrow("Simulation failed, no result returned.");
  });

  it("rejects malformed results", () => {
    expect(() => parseEngineResult({ segments: -1, network: "" })).toThrow(
      /^Malformed engine result: segments:/
    );
  });
});

describe("RUNNER_SCRIPT", () => {
  it("points at the bundled runner", () => {
    expect(RUNNER_SCRIPT.endsWith("run_karstnsim.py")).toBe(true);
    expect(existsSync(RUNNER_SCRIPT)).toBe(true);
  });
});

describe("PythonKarstEngine", () => {
  const input = prepareEngineInput(readArchive(buildExport()));

  function engine(fixture: string, python: string = process.execPath): PythonKarstEngine {
    return new PythonKarstEngine({
      python,
      script: join(import.meta.dirname, "fixtures", fixture),
    });
  }

  function workDirs(): string[] {
    return readdirSync(tmpdir()).filter((name) => name.startsWith("vk-karstnsim-"));
  }

  it("runs the script and reads its result", async () => {
    const before = workDirs();
    await expect(engine("runner-ok.mjs").run(input)).resolves.toEqual({
      segments: 3,
      network: "Test Run",
    });
    expect(workDirs()).toEqual(before);
  });

  it("asks the script to dump the layers into a directory", async () => {
    const dir = mkdtempSync(join(tmpdir(), "vk-dump-"));
    const paths = await engine("runner-ok.mjs").dump(input, dir);
    expect(paths).toEqual([join(dir, "debug_sinks.txt")]);
    expect(readFileSync(join(dir, "debug_sinks.txt"), "utf-8")).toBe("sinks 3\n");
  });

  it("reports a failed run with the end of stderr", async () => {
    const before = workDirs();
    const expected = [
      "KarstNSim runner failed with exit code 3",
      ...Array.from({ length: 20 }, (_, i) => `line ${i + 10}`),
    ].join("\n");
    await expect(engine("runner-fail.mjs").run(input)).rejects.toThrow(
      new Error(expected)
    );
    expect(workDirs()).toEqual(before);
  });

  it("fails when no result is written", async () => {
    await expect(engine("runner-silent.mjs").run(input)).rejects.toThrow(
      "Simulation failed, the engine wrote no result."
    );
  });

  it("fails when the engine returns nothing", async () => {
    await expect(engine("runner-null.mjs").run(input)).rejects.toThrow(
      "Simulation failed, no result returned."
    );
  });

  it("names the result file when it is not JSON", async () => {
    await expect(engine("runner-garbage.mjs").run(input)).rejects.toThrow(
      /^The KarstNSim runner wrote an invalid result\.json: /
    );
  });

  it("reports an interpreter that cannot be started", async () => {
    const missing = join(tmpdir(), "vk-no-such-python");
    await expect(engine("runner-ok.mjs", missing).run(input)).rejects.toThrow(
      `Could not start ${missing}: spawn ${missing} ENOENT`
    );
  });
});
