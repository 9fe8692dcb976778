// DEM normalization and triangulated surfaces (topography, water tables)

import { silentLogger, type Logger } from "./log.js";
import { voxelIndex } from "./parser.js";
import type {
  ComputeResolution,
  DemGrid,
  DemResolution,
  TriangleSurface,
  Vec3,
  VkProjectBox,
  VoxelGrid,
} from "./model.js";

export function boxDepth(box: VkProjectBox): number {
  return box.maxElevation - box.minElevation;
}

/**
 * Decimate the raw DEM to the compute grid by keeping every
 * floor(nRows / ny)-th row and floor(nCols / nx)-th column, then flip it so
 * that row 0 lies at min y.
 */
export function normalizeDem(
  raw: Float32Array,
  resolution: DemResolution,
  compute: ComputeResolution,
  box: VkProjectBox
): DemGrid {
  const { nRows, nCols } = resolution;
  if (raw.length !== nRows * nCols) {
    throw new Error(
      `DEM has ${raw.length} values, expected ${nRows}x${nCols} = ${nRows * nCols}`
    );
  }
  const rowStep = Math.floor(nRows / compute.y);
  const colStep = Math.floor(nCols / compute.x);
  if (rowStep < 1 || colStep < 1) {
    throw new Error(
      `DEM (${nCols}x${nRows}) is coarser than the compute grid (${compute.x}x${compute.y})`
    );
  }
  const rows = Math.ceil(nRows / rowStep);
  const cols = Math.ceil(nCols / colStep);
  if (rows < 2 || cols < 2) {
    throw new Error("Surface data grid must have at least 2 rows and 2 columns");
  }

  const values = new Float32Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    const target = rows - 1 - r;
    for (let c = 0; c < cols; c++) {
      values[target * cols + c] = raw[r * rowStep * nCols + c * colStep];
    }
  }
  return {
    nRows: rows,
    nCols: cols,
    values,
    dx: box.width / (cols - 1),
    dy: box.height / (rows - 1),
  };
}

/**
 * Two triangles per grid cell. indices holds a vertex index per node
 * (row-major, -1 for no vertex); cells with a missing corner are skipped.
 */
export function triangulateGrid(
  indices: Int32Array,
  rows: number,
  cols: number
): Vec3[] {
  const triangles: Vec3[] = [];
  for (let r = 0; r < rows - 1; r++) {
    for (let c = 0; c < cols - 1; c++) {
      const v1 = indices[r * cols + c];
      const v2 = indices[r * cols + c + 1];
      const v3 = indices[(r + 1) * cols + c];
      const v4 = indices[(r + 1) * cols + c + 1];
      if (Math.min(v1, v2, v3, v4) < 0) continue;
      triangles.push([v1, v2, v3], [v2, v4, v3]);
    }
  }
  return triangles;
}

/** Topographic surface in local box coordinates (x, y from 0, z absolute). */
export function demToSurface(dem: DemGrid): TriangleSurface {
  const vertices: Vec3[] = [];
  const indices = new Int32Array(dem.nRows * dem.nCols);
  for (let r = 0; r < dem.nRows; r++) {
    for (let c = 0; c < dem.nCols; c++) {
      indices[r * dem.nCols + c] = vertices.length;
      vertices.push([c * dem.dx, r * dem.dy, dem.values[r * dem.nCols + c]]);
    }
  }
  return { vertices, triangles: triangulateGrid(indices, dem.nRows, dem.nCols) };
}

/** Bilinear DEM elevation at local (x, y). Points on the far edges are allowed. */
export function elevationAt(dem: DemGrid, x: number, y: number): number {
  const col = x / dem.dx;
  const row = y / dem.dy;
  const tol = 1e-9;
  if (
    col < -tol ||
    row < -tol ||
    col > dem.nCols - 1 + tol ||
    row > dem.nRows - 1 + tol
  ) {
    throw new Error(`Point (${x},${y}) out of DEM bounds`);
  }
  const col0 = Math.min(Math.max(Math.floor(col), 0), dem.nCols - 2);
  const row0 = Math.min(Math.max(Math.floor(row), 0), dem.nRows - 2);
  const dc = col - col0;
  const dr = row - row0;
  const at = (r: number, c: number): number => dem.values[r * dem.nCols + c];
  const z0 = at(row0, col0) * (1 - dc) + at(row0, col0 + 1) * dc;
  const z1 = at(row0 + 1, col0) * (1 - dc) + at(row0 + 1, col0 + 1) * dc;
  return z0 * (1 - dr) + z1 * dr;
}

/**
 * One water table per groundwater body found in the voxels, keyed by gwb id.
 * Each column contributes a vertex at the top of its highest layer that
 * belongs to the body.
 */
export function buildWaterTables(
  voxels: VoxelGrid,
  box: VkProjectBox,
  logger: Logger = silentLogger
): Map<number, TriangleSurface> {
  const { header } = voxels;
  const { nx, ny, nz } = header;
  const dx = nx > 1 ? box.width / (nx - 1) : 0;
  const dy = ny > 1 ? box.height / (ny - 1) : 0;
  const dz = boxDepth(box) / nz;

  // gwb id -> top layer per column (ix + nx * iy), -1 where absent
  const tops = new Map<number, Int32Array>();
  for (let iz = 0; iz < nz; iz++) {
    for (let iy = 0; iy < ny; iy++) {
      for (let ix = 0; ix < nx; ix++) {
        const gwbId = voxels.gwbIds[voxelIndex(header, ix, iy, iz)];
        if (gwbId <= 0) continue;
        let top = tops.get(gwbId);
        if (!top) {
          top = new Int32Array(nx * ny).fill(-1);
          tops.set(gwbId, top);
        }
        top[ix + nx * iy] = iz;
      }
    }
  }

  const surfaces = new Map<number, TriangleSurface>();
  for (const gwbId of [...tops.keys()].sort((a, b) => a - b)) {
    const top = tops.get(gwbId);
    if (!top) continue;

    let xMin = nx;
    let xMax = -1;
    let yMin = ny;
    let yMax = -1;
    for (let iy = 0; iy < ny; iy++) {
      for (let ix = 0; ix < nx; ix++) {
        if (top[ix + nx * iy] < 0) continue;
        xMin = Math.min(xMin, ix);
        xMax = Math.max(xMax, ix);
        yMin = Math.min(yMin, iy);
        yMax = Math.max(yMax, iy);
      }
    }
    const width = xMax - xMin + 1;
    const height = yMax - yMin + 1;

    const indices = new Int32Array(width * height).fill(-1);
    const vertices: Vec3[] = [];
    for (let ly = 0; ly < height; ly++) {
      for (let lx = 0; lx < width; lx++) {
        const layer = top[xMin + lx + nx * (yMin + ly)];
        if (layer < 0) continue;
        indices[ly * width + lx] = vertices.length;
        vertices.push([
          (xMin + lx) * dx,
          (yMin + ly) * dy,
          (layer + 1) * dz + box.minElevation,
        ]);
      }
    }

    const triangles = triangulateGrid(indices, height, width);
    if (triangles.length === 0) {
      logger.warn(
        `Skipping groundwater body ${gwbId} because no triangles could be generated.`
      );
      continue;
    }
    surfaces.set(gwbId, { vertices, triangles });
    logger.info(
      `Built water table surface for GWB ${gwbId} with ${vertices.length} vertices and ${triangles.length} triangles.`
    );
  }
  return surfaces;
}
