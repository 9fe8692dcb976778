// Springs and their water tables

import type {
  EngineSpring,
  GroundwaterBody,
  TriangleSurface,
  VkSpring,
} from "./model.js";

export interface OrderedWaterTables {
  /** gwb ids in engine order; water table n (1-based) is gwbIds[n - 1] */
  gwbIds: number[];
  surfaces: TriangleSurface[];
}

export function orderWaterTables(
  byGwb: Map<number, TriangleSurface>
): OrderedWaterTables {
  const gwbIds = [...byGwb.keys()].sort((a, b) => a - b);
  const surfaces: TriangleSurface[] = [];
  for (const id of gwbIds) {
    const surface = byGwb.get(id);
    if (surface) surfaces.push(surface);
  }
  return { gwbIds, surfaces };
}

/**
 * Engine springs, numbered from 1 in archive order. Each spring takes the
 * water table of the groundwater body that drains to it.
 */
export function buildSprings(
  springs: VkSpring[],
  groundwaterBodies: GroundwaterBody[],
  waterTableGwbIds: number[]
): EngineSpring[] {
  // poi id -> water table number
  const springToWaterTable = new Map<number, number>();
  waterTableGwbIds.forEach((gwbId, i) => {
    for (const gwb of groundwaterBodies) {
      if (gwb.gwbId === gwbId) springToWaterTable.set(gwb.springId, i + 1);
    }
  });

  return springs.map((s, i) => {
    const origin: EngineSpring["origin"] = [s.x, s.y, s.z];
    const waterTableIndex = springToWaterTable.get(s.poiId);
    if (waterTableIndex === undefined) {
      throw new Error(
        `Spring ${s.poiId} at (${origin.join(", ")}) (index ${i + 1}) has no associated groundwater body.`
      );
    }
    return { origin, index: i + 1, waterTableIndex, radius: 0.0 };
  });
}
