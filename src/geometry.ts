// Planar polygon helpers and the seeded random source used for sink placement

export type Ring = ReadonlyArray<readonly [number, number]>;

/** Unsigned area by the shoelace formula; the ring may be open or closed. */
export function polygonArea(ring: Ring): number {
  let area = 0;
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += ring[i][0] * ring[j][1];
    area -= ring[j][0] * ring[i][1];
  }
  return Math.abs(area) / 2;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function polygonBounds(ring: Ring): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of ring) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { minX, minY, maxX, maxY };
}

const EPS = 1e-9;

function onSegment(
  px: number,
  py: number,
  ax: number,
  ay: number,
  bx: number,
  by: number
): boolean {
  const cross = (bx - ax) * (py - ay) - (by - ay) * (px - ax);
  const scale = Math.max(1, Math.abs(bx - ax), Math.abs(by - ay));
  if (Math.abs(cross) > EPS * scale * scale) return false;
  return (
    px >= Math.min(ax, bx) - EPS &&
    px <= Math.max(ax, bx) + EPS &&
    py >= Math.min(ay, by) - EPS &&
    py <= Math.max(ay, by) + EPS
  );
}

/** Point inside the polygon or on its boundary (even-odd rule). */
export function polygonCovers(ring: Ring, x: number, y: number): boolean {
  const n = ring.length;
  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if (onSegment(x, y, xi, yi, xj, yj)) return true;
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

// --- Seeded random ---

export interface Random {
  /** Uniform in [0, 1) */
  next(): number;
  uniform(min: number, max: number): number;
  /** Index drawn with probability proportional to weights[i] */
  choice(weights: readonly number[]): number;
}

/**
 * mulberry32 generator; the same seed always yields the same sequence.
 * Seeds must be integers in [0, 2^32).
 */
export function createRandom(seed: number): Random {
  if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    throw new RangeError(`Seed must be an integer in [0, 4294967295] (got ${seed})`);
  }
  let t = seed;
  const next = (): number => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
  return {
    next,
    uniform: (min, max) => min + (max - min) * next(),
    choice: (weights) => {
      const total = weights.reduce((a, b) => a + b, 0);
      if (weights.length === 0 || !(total > 0)) {
        throw new Error("choice() needs at least one positive weight");
      }
      let target = next() * total;
      for (let i = 0; i < weights.length; i++) {
        target -= weights[i];
        if (target < 0) return i;
      }
      // rounding left a sliver past the last bucket
      for (let i = weights.length - 1; i >= 0; i--) {
        if (weights[i] > 0) return i;
      }
      return weights.length - 1;
    },
  };
}
