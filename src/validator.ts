// Visual KARSYS project validator
// Geometric and referential checks run after the archive has been parsed.

import { mapRanksToUnits } from "./projectBox.js";
import type { SimulationParameters, ValidationResult, VkProject } from "./model.js";

// Relative tolerance between the voxel header extents and the project box
const EXTENT_TOLERANCE = 0.01;

// Sink placement uses a 32-bit generator
const MAX_SEED = 0xffffffff;

function validateParameters(
  params: SimulationParameters,
  errors: string[]
): void {
  if (params.seed < 0 || params.seed > MAX_SEED) {
    errors.push(`Parameter 'seed' must be within [0, ${MAX_SEED}] (got ${params.seed})`);
  }
  if (params.kPts < 1) errors.push(`Parameter 'kPts' must be >= 1 (got ${params.kPts})`);
  if (params.nSinks < 0) errors.push(`Parameter 'nSinks' must be >= 0 (got ${params.nSinks})`);
  if (params.cohesionFactor < 0 || params.cohesionFactor > 1) {
    errors.push(
      `Parameter 'cohesionFactor' must be within [0, 1] (got ${params.cohesionFactor})`
    );
  }
  for (const key of ["searchRadius", "maxInceptionSurfaceDistance"] as const) {
    const value = params[key];
    if (value !== "auto" && value <= 0) {
      errors.push(`Parameter '${key}' must be 'auto' or > 0 (got ${value})`);
    }
  }
  for (const key of ["rMinPervious", "rMinImpervious"] as const) {
    const value = params[key];
    if (value !== "auto" && value <= 0) {
      errors.push(`Parameter '${key}' must be 'auto' or > 0 (got ${value})`);
    }
  }
  if (params.densitySamplingModifier <= 0) {
    errors.push(
      `Parameter 'densitySamplingModifier' must be > 0 (got ${params.densitySamplingModifier})`
    );
  }
}

export function validateProject(project: VkProject): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { projectBox: box, voxels, parameters } = project;
  const h = voxels.header;

  validateParameters(parameters, errors);

  // Project box
  if (box.width <= 0 || box.height <= 0) {
    errors.push(`Project box must have a positive size (got ${box.width} x ${box.height})`);
  }
  if (box.maxElevation <= box.minElevation) {
    errors.push(
      `Project box max_elevation (${box.maxElevation}) must be above min_elevation (${box.minElevation})`
    );
  }

  const extents: Array<[string, number, number]> = [
    ["x", h.xmax - h.xmin, box.width],
    ["y", h.ymax - h.ymin, box.height],
    ["z", h.zmax - h.zmin, box.maxElevation - box.minElevation],
  ];
  for (const [axis, voxelExtent, boxExtent] of extents) {
    if (boxExtent > 0 && Math.abs(voxelExtent - boxExtent) > EXTENT_TOLERANCE * boxExtent) {
      warnings.push(
        `Voxel grid ${axis} extent (${voxelExtent}) differs from the project box (${boxExtent})`
      );
    }
  }

  // DEM
  const { nRows, nCols } = project.demResolution;
  if (project.demValues.length !== nRows * nCols) {
    errors.push(
      `DEM has ${project.demValues.length} values, expected ${nRows}x${nCols} = ${nRows * nCols}`
    );
  }
  if (nRows < h.ny || nCols < h.nx) {
    errors.push(
      `DEM (${nCols}x${nRows}) is coarser than the compute grid (${h.nx}x${h.ny})`
    );
  }

  // Stratigraphy and voxel ranks
  const knownUnitIds = new Set(project.stratigraphy.map((u) => u.stratiUnitId));
  for (const unitId of project.voxelsUnits) {
    if (!knownUnitIds.has(unitId)) {
      warnings.push(`voxels_units references unknown strati unit id ${unitId}`);
    }
  }
  const rankToUnit = mapRanksToUnits(project.stratigraphy, project.voxelsUnits);
  for (const rank of new Set(voxels.ranks)) {
    if (!rankToUnit.has(rank)) {
      errors.push(`Voxel rank ${rank} maps to no geological unit`);
    }
  }

  // Springs and catchments
  if (project.springs.length === 0) errors.push("The export contains no springs");
  const springIds = new Set<number>();
  for (const spring of project.springs) {
    const ctx = `Spring ${spring.poiId}`;
    if (springIds.has(spring.poiId)) errors.push(`Duplicate spring poi_id: ${spring.poiId}`);
    springIds.add(spring.poiId);

    if (spring.x < 0 || spring.x > box.width || spring.y < 0 || spring.y > box.height) {
      errors.push(`${ctx}: (${spring.x}, ${spring.y}) lies outside the project box`);
    }
    if (spring.z < box.minElevation || spring.z > box.maxElevation) {
      warnings.push(
        `${ctx}: elevation ${spring.z} outside [${box.minElevation}, ${box.maxElevation}]`
      );
    }

    if (parameters.nSinks > 0) {
      if (spring.catchment.length < 3) {
        errors.push(`${ctx}: catchment needs at least 3 vertices (got ${spring.catchment.length})`);
      }
      const outside = spring.catchment.filter(
        ([x, y]) => x < 0 || x > box.width || y < 0 || y > box.height
      );
      if (outside.length > 0) {
        errors.push(`${ctx}: ${outside.length} catchment vertex/vertices outside the project box`);
      }
    }
  }

  // Groundwater bodies
  const referencedSprings = new Set<number>();
  const declaredGwbs = new Set<number>();
  for (const gwb of project.groundwaterBodies) {
    declaredGwbs.add(gwb.gwbId);
    if (!springIds.has(gwb.springId)) {
      errors.push(`Groundwater body ${gwb.gwbId} references unknown spring ${gwb.springId}`);
    }
    referencedSprings.add(gwb.springId);
  }
  for (const spring of project.springs) {
    if (!referencedSprings.has(spring.poiId)) {
      warnings.push(`Spring ${spring.poiId} is not referenced by any groundwater body`);
    }
  }
  for (const gwbId of new Set(voxels.gwbIds)) {
    if (gwbId > 0 && !declaredGwbs.has(gwbId)) {
      warnings.push(`Groundwater body ${gwbId} appears in the voxels but has no gwb file`);
    }
  }

  // Inception surfaces
  project.faults.forEach((fault, i) => {
    const n = fault.vertices.length;
    const bad = fault.triangles.filter((t) => t.some((v) => v < 0 || v >= n));
    if (bad.length > 0) {
      errors.push(
        `Inception surface ${i + 1}: ${bad.length} triangle(s) reference vertices out of range`
      );
    }
  });

  return { errors, warnings, isValid: errors.length === 0 };
}
