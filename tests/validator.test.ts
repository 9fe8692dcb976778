import { describe, it, expect } from "vitest";
import { readArchive } from "../src/parser.js";
import { validateProject } from "../src/validator.js";
import type { VkProject } from "../src/model.js";
import { buildExport, faultBuffer, type EntryValue } from "./helpers.js";

function project(overrides: Record<string, EntryValue> = {}): VkProject {
  return readArchive(buildExport(overrides));
}

describe("validateProject", () => {
  it("accepts the reference export without warnings", () => {
    expect(validateProject(project())).toEqual({ errors: [], warnings: [], isValid: true });
  });

  it("rejects an inverted elevation range", () => {
    const result = validateProject(
      project({
        "project_box.json": { width: 100, height: 100, min_elevation: 40, max_elevation: 40 },
      })
    );
    expect(result.isValid).toBe(false);
    expect(result.errors).toContain(
      "Project box max_elevation (40) must be above min_elevation (40)"
    );
  });

  it("checks springs against the project box", () => {
    const result = validateProject(
      project({
        "poi_1.json": { poi_id: 1, x: 120, y: 10, z: 55, catchment: [[0, 0], [100, 0], [0, 100]] },
      })
    );
    expect(result.errors).toEqual(["Spring 1: (120, 10) lies outside the project box"]);
    expect(result.warnings).toEqual(["Spring 1: elevation 55 outside [0, 40]"]);
  });

  it("checks catchments only when sinks are requested", () => {
    const outside = {
      poi_id: 1,
      x: 10,
      y: 10,
      z: 5,
      catchment: [[0, 0], [150, 0]],
    };
    const withSinks = validateProject(project({ "poi_1.json": outside }));
    expect(withSinks.errors).toEqual([
      "Spring 1: catchment needs at least 3 vertices (got 2)",
      "Spring 1: 1 catchment vertex/vertices outside the project box",
    ]);

    const noSinks = validateProject(
      project({ "poi_1.json": outside, "config.json": { nSinks: 0 } })
    );
    expect(noSinks.isValid).toBe(true);
  });

  it("flags unknown springs and unused groundwater bodies", () => {
    const result = validateProject(project({ "gwb_1.json": { gwb_id: 1, spring_id: 9 } }));
    expect(result.errors).toEqual(["Groundwater body 1 references unknown spring 9"]);
    expect(result.warnings).toEqual(["Spring 1 is not referenced by any groundwater body"]);
  });

  it("warns about groundwater bodies without a gwb file", () => {
    const result = validateProject(project({ "gwb_1.json": null }));
    expect(result.warnings).toEqual([
      "Spring 1 is not referenced by any groundwater body",
      "Groundwater body 1 appears in the voxels but has no gwb file",
    ]);
  });

  it("requires every voxel rank to map to a unit", () => {
    const result = validateProject(
      project({
        "stratigraphy.json": [{ name: "Limestone", permeability: "Karstified", stratiUnitId: 10 }],
        "voxels_units.json": [10],
      })
    );
    expect(result.errors).toEqual(["Voxel rank 2 maps to no geological unit"]);
  });

  it("warns about unknown voxel unit ids", () => {
    const result = validateProject(project({ "voxels_units.json": [10, 20, 30] }));
    expect(result.warnings).toEqual(["voxels_units references unknown strati unit id 30"]);
  });

  it("checks the DEM size", () => {
    const result = validateProject(project({ "dem_resolution.json": { n_cols: 1, n_rows: 16 } }));
    expect(result.errors).toEqual(["DEM (1x16) is coarser than the compute grid (2x2)"]);
  });

  it("checks the DEM value count", () => {
    const result = validateProject(project({ "dem_resolution.json": { n_cols: 4, n_rows: 5 } }));
    expect(result.errors).toEqual(["DEM has 16 values, expected 5x4 = 20"]);
  });

  it("warns when the voxel grid does not span the project box", () => {
    const result = validateProject(
      project({
        "project_box.json": { width: 200, height: 100, min_elevation: 0, max_elevation: 40 },
      })
    );
    expect(result.warnings).toEqual([
      "Voxel grid x extent (100) differs from the project box (200)",
    ]);
  });

  it("checks fault triangle indices", () => {
    const result = validateProject(
      project({ "fault_1.bin": faultBuffer([[0, 0, 0]], [[0, 1, 2]]) })
    );
    expect(result.errors).toEqual([
      "Inception surface 1: 1 triangle(s) reference vertices out of range",
    ]);
  });

  it("checks parameter ranges", () => {
    const result = validateProject(
      project({
        "config.json": {
          kPts: 0,
          nSinks: -1,
          cohesionFactor: 1.5,
          searchRadius: -2,
          maxInceptionSurfaceDistance: "auto",
          rMinPervious: 0,
          densitySamplingModifier: 0,
        },
      })
    );
    expect(result.errors).toEqual([
      "Parameter 'kPts' must be >= 1 (got 0)",
      "Parameter 'nSinks' must be >= 0 (got -1)",
      "Parameter 'cohesionFactor' must be within [0, 1] (got 1.5)",
      "Parameter 'searchRadius' must be 'auto' or > 0 (got -2)",
      "Parameter 'rMinPervious' must be 'auto' or > 0 (got 0)",
      "Parameter 'densitySamplingModifier' must be > 0 (got 0)",
    ]);
  });

  it("rejects seeds outside the 32-bit range", () => {
    expect(validateProject(project({ "config.json": { seed: 2 ** 32 } })).errors).toEqual([
      "Parameter 'seed' must be within [0, 4294967295] (got 4294967296)",
    ]);
    expect(validateProject(project({ "config.json": { seed: -1 } })).errors).toEqual([
      "Parameter 'seed' must be within [0, 4294967295] (got -1)",
    ]);
  });

  it("requires at least one spring", () => {
    const result = validateProject(project({ "poi_1.json": null, "gwb_1.json": null }));
    expect(result.errors).toEqual(["The export contains no springs"]);
  });
});
