// Project box grid: per-cell karstification potential and sampling density

import { silentLogger, type Logger } from "./log.js";
import { voxelIndex } from "./parser.js";
import { boxDepth } from "./surface.js";
import type {
  AutoOrNumber,
  GeologicalUnit,
  Permeability,
  ProjectBoxGrid,
  VkProjectBox,
  VoxelGrid,
} from "./model.js";

export const NO_VALUE = -99999.0;

export const PERMEABILITY_POTENTIAL: Record<Permeability, number> = {
  Karstified: 0.5,
  NonKarstified: 0.0,
  PorousPermeability: 0.0,
  Undefined: 0.0,
};

export const SKY: GeologicalUnit = {
  name: "Sky",
  permeability: "NonKarstified",
  stratiUnitId: 0,
};

export const DUMMY: GeologicalUnit = {
  name: "Dummy",
  permeability: "Undefined",
  stratiUnitId: 0,
};

/**
 * Voxel rank -> geological unit. Rank 0 is the sky, rank j + 1 is the unit
 * listed j-th in voxels_units. When voxels_units lists fewer units than the
 * stratigraphy, the last rank is a placeholder unit.
 */
export function mapRanksToUnits(
  stratigraphy: GeologicalUnit[],
  voxelsUnits: number[],
  logger: Logger = silentLogger
): Map<number, GeologicalUnit> {
  const rankToUnit = new Map<number, GeologicalUnit>();
  voxelsUnits.forEach((unitId, j) => {
    const unit = stratigraphy.find((u) => u.stratiUnitId === unitId);
    if (unit) {
      rankToUnit.set(j + 1, unit);
    } else {
      logger.warn(`No geological unit found with strati_unit_id=${unitId}`);
    }
  });
  if (voxelsUnits.length < stratigraphy.length) {
    rankToUnit.set(stratigraphy.length, DUMMY);
  }
  rankToUnit.set(0, SKY);
  return rankToUnit;
}

export interface DensityOptions {
  rMinPervious: AutoOrNumber;
  rMinImpervious: AutoOrNumber;
  densitySamplingModifier: number;
}

/** Sampling densities for permeable and impermeable cells. */
export function resolveDensities(
  cellsW: number,
  depth: number,
  options: DensityOptions
): { pervious: number; impervious: number } {
  const pervious =
    options.rMinPervious === "auto" ? cellsW / depth : options.rMinPervious;
  const impervious =
    options.rMinImpervious === "auto"
      ? pervious * options.densitySamplingModifier
      : options.rMinImpervious;
  if (pervious > 1 || impervious > 1) {
    throw new Error(
      `Density modifier too high, resulting density > 1 (base=${pervious}, sparse=${impervious})`
    );
  }
  return { pervious, impervious };
}

export function buildProjectBox(
  box: VkProjectBox,
  voxels: VoxelGrid,
  rankToUnit: Map<number, GeologicalUnit>,
  density: DensityOptions,
  logger: Logger = silentLogger
): ProjectBoxGrid {
  const { header } = voxels;
  const cellsU = header.nx;
  const cellsV = header.ny;
  const cellsW = header.nz;
  const depth = boxDepth(box);

  const uniqueRanks = [...new Set(voxels.ranks)].sort((a, b) => a - b);
  for (const rank of uniqueRanks) {
    const unit = rankToUnit.get(rank);
    if (!unit) throw new Error(`Voxel rank ${rank} has no geological unit`);
    logger.info(`Rank ${rank}: ${unit.name} (permeability=${unit.permeability})`);
  }

  const { pervious, impervious } = resolveDensities(cellsW, depth, density);

  const total = cellsU * cellsV * cellsW;
  const densities = new Array<number>(total).fill(NO_VALUE);
  const karstificationPotential = new Array<number>(total).fill(NO_VALUE);

  for (let iw = 0; iw < cellsW; iw++) {
    for (let iv = 0; iv < cellsV; iv++) {
      for (let iu = 0; iu < cellsU; iu++) {
        const index = iu + cellsU * (iv + cellsV * iw);
        const voxel = voxelIndex(header, iu, iv, iw);
        const rank = voxels.ranks[voxel];
        const gwbId = voxels.gwbIds[voxel];

        let potential: number;
        if (gwbId > 0) {
          potential = 1.0;
        } else if (rank > 0) {
          const unit = rankToUnit.get(rank);
          if (!unit) throw new Error(`Voxel rank ${rank} has no geological unit`);
          potential = PERMEABILITY_POTENTIAL[unit.permeability];
        } else {
          continue; // sky
        }

        karstificationPotential[index] = potential;
        densities[index] = potential > 0 ? pervious : impervious;
      }
    }
  }

  return {
    basis: [0, 0, box.minElevation],
    u: [box.width, 0, 0],
    v: [0, box.height, 0],
    w: [0, 0, depth],
    cellsU,
    cellsV,
    cellsW,
    densities,
    karstificationPotential,
  };
}
