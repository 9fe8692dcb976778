// Run output in the Visual KARSYS import format

import type { ComputeResolution, SimulationParameters } from "./model.js";

// --- Run output ---

export interface RunInfo {
  generationTime: Date;
  generationDurationS: number;
  computeResolution: ComputeResolution;
}

export function runInfoToJson(info: RunInfo, params: SimulationParameters): string {
  const payload = {
    metadata: {
      generationTime: info.generationTime.toISOString(),
      generationDurationS: info.generationDurationS,
      computeResolution: {
        x: info.computeResolution.x,
        y: info.computeResolution.y,
        z: info.computeResolution.z,
      },
    },
    config: {
      name: params.name,
      seed: params.seed,
      kPts: params.kPts,
      cohesionFactor: params.cohesionFactor,
      nSinks: params.nSinks,
      searchRadius: params.searchRadius,
      inceptionSurfaceConstraintWeight: params.inceptionSurfaceConstraintWeight,
      maxInceptionSurfaceDistance: params.maxInceptionSurfaceDistance,
      densitySamplingModifier: params.densitySamplingModifier,
      rMinPervious: params.rMinPervious,
      rMinImpervious: params.rMinImpervious,
    },
  };
  return JSON.stringify(payload, null, 2);
}

/** "# Run info", the run JSON, "# Data", then the engine's network text. */
export function formatRunOutput(
  info: RunInfo,
  params: SimulationParameters,
  network: string
): string {
  return ["# Run info", runInfoToJson(info, params), "# Data", network].join("\n");
}
