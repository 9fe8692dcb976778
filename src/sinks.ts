// Random sink placement inside spring catchments

import {
  polygonArea,
  polygonBounds,
  polygonCovers,
  type Random,
  type Ring,
} from "./geometry.js";
import { silentLogger, type Logger } from "./log.js";
import { elevationAt } from "./surface.js";
import {
  CONNECTED,
  NOT_CONNECTED,
  type ConnectivityMatrix,
  type DemGrid,
  type EngineSink,
  type VkSpring,
} from "./model.js";

/** Rejection sampling gives up after this many draws per requested point. */
export const MAX_DRAWS_PER_POINT = 10_000;

/** Uniform points inside a polygon by rejection sampling over its bounds. */
export function randomPointsInPolygon(
  ring: Ring,
  count: number,
  rng: Random
): Array<[number, number]> {
  if (count <= 0) return [];
  const { minX, minY, maxX, maxY } = polygonBounds(ring);
  const points: Array<[number, number]> = [];
  const maxDraws = count * MAX_DRAWS_PER_POINT;
  let draws = 0;
  while (points.length < count) {
    if (draws >= maxDraws) {
      throw new Error(
        `Could not place ${count} points in catchment after ${draws} draws (degenerate polygon?)`
      );
    }
    draws++;
    const x = rng.uniform(minX, maxX);
    const y = rng.uniform(minY, maxY);
    if (polygonCovers(ring, x, y)) points.push([x, y]);
  }
  return points;
}

export interface SinkPlacement {
  sinks: EngineSink[];
  connectivityMatrix: ConnectivityMatrix;
}

/**
 * Spread nSinks over the springs' catchments, weighted by catchment area.
 * Each sink connects only to the spring whose catchment holds it.
 */
export function placeSinks(
  nSinks: number,
  springs: VkSpring[],
  dem: DemGrid,
  rng: Random,
  logger: Logger = silentLogger
): SinkPlacement {
  if (nSinks <= 0 || springs.length === 0) {
    return { sinks: [], connectivityMatrix: [] };
  }

  const areas = springs.map((s) => polygonArea(s.catchment));
  const totalArea = areas.reduce((a, b) => a + b, 0);
  const weights =
    totalArea === 0
      ? areas.map(() => 1 / areas.length)
      : areas.map((a) => a / totalArea);

  const counts = new Array<number>(springs.length).fill(0);
  if (springs.length === 1) {
    counts[0] = nSinks;
  } else {
    for (let i = 0; i < nSinks; i++) counts[rng.choice(weights)]++;
  }

  const sinks: EngineSink[] = [];
  const connectivityMatrix: ConnectivityMatrix = [];
  springs.forEach((spring, idx) => {
    const count = counts[idx];
    if (count === 0) return;
    logger.info(
      `Allocating ${count} sinks to spring ${spring.poiId} catchment (area=${areas[idx].toFixed(2)})`
    );
    for (const [x, y] of randomPointsInPolygon(spring.catchment, count, rng)) {
      sinks.push({
        origin: [x, y, elevationAt(dem, x, y)],
        index: sinks.length + 1,
        order: 1,
        radius: 0.0,
      });
      const row = new Array<number>(springs.length).fill(NOT_CONNECTED);
      row[idx] = CONNECTED;
      connectivityMatrix.push(row);
    }
  });

  return { sinks, connectivityMatrix };
}
