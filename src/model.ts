// Visual KARSYS export model and KarstNSim input/output shapes

export type Permeability =
  | "Karstified"
  | "NonKarstified"
  | "PorousPermeability"
  | "Undefined";

export type AutoOrNumber = "auto" | number;

export type Vec3 = [number, number, number];

export interface SimulationParameters {
  name: string;
  seed: number;
  kPts: number;
  cohesionFactor: number;
  nSinks: number;
  searchRadius: AutoOrNumber;
  inceptionSurfaceConstraintWeight: number;
  maxInceptionSurfaceDistance: AutoOrNumber;
  /** > 1.0 samples permeable cells more densely than impermeable ones */
  densitySamplingModifier: number;
  rMinPervious: AutoOrNumber;
  rMinImpervious: AutoOrNumber;
}

export type SimulationOverrides = Partial<SimulationParameters>;

// --- Archive content ---

export interface VkProjectBox {
  width: number;
  height: number;
  minElevation: number;
  maxElevation: number;
}

export interface DemResolution {
  nCols: number;
  nRows: number;
}

export interface GeologicalUnit {
  name: string;
  permeability: Permeability;
  stratiUnitId: number;
}

export interface VkSpring {
  poiId: number;
  x: number;
  y: number;
  z: number;
  catchment: Array<[number, number]>;
}

export interface GroundwaterBody {
  gwbId: number;
  springId: number;
}

export interface VoxelsHeader {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
  zmin: number;
  zmax: number;
  nx: number;
  ny: number;
  nz: number;
  novalue: number;
}

/** Voxel ranks and groundwater body ids, indexed by ix + nx * (iy + ny * iz). */
export interface VoxelGrid {
  header: VoxelsHeader;
  ranks: Int32Array;
  gwbIds: Int32Array;
}

export interface TriangleSurface {
  vertices: Vec3[];
  triangles: Vec3[];
}

export interface VkProject {
  parameters: SimulationParameters;
  projectBox: VkProjectBox;
  demResolution: DemResolution;
  /** Raw DEM, row-major, row 0 at max y */
  demValues: Float32Array;
  stratigraphy: GeologicalUnit[];
  voxels: VoxelGrid;
  voxelsUnits: number[];
  springs: VkSpring[];
  groundwaterBodies: GroundwaterBody[];
  faults: TriangleSurface[];
}

/** DEM decimated to the compute grid, row 0 at min y. */
export interface DemGrid {
  nRows: number;
  nCols: number;
  values: Float32Array;
  dx: number;
  dy: number;
}

export interface ComputeResolution {
  x: number;
  y: number;
  z: number;
}

// --- Engine input ---

export interface ProjectBoxGrid {
  basis: Vec3;
  u: Vec3;
  v: Vec3;
  w: Vec3;
  cellsU: number;
  cellsV: number;
  cellsW: number;
  densities: number[];
  karstificationPotential: number[];
}

export interface EngineSpring {
  origin: Vec3;
  index: number;
  waterTableIndex: number;
  radius: number;
}

export interface EngineSink {
  origin: Vec3;
  index: number;
  order: number;
  radius: number;
}

export const CONNECTED = 1;
export const NOT_CONNECTED = 0;

/** One row per sink, one column per spring. */
export type ConnectivityMatrix = number[][];

export interface EngineConfig {
  karsticNetworkName: string;
  selectedSeed: number;
  kPts: number;
  fractionKarstPerm: number;
  nghbRadius: number;
  useMaxNghbRadius: boolean;
  inceptionSurfaceConstraintWeight: number;
  maxInceptionSurfaceDistance: number;
  refineSurfaceSampling: number;
  useKarstificationPotential: boolean;
  karstificationPotentialWeight: number;
  nbDeadendPoints: number;
  createVsetSampling: boolean;
}

export interface EngineInput {
  config: EngineConfig;
  projectBox: ProjectBoxGrid;
  topoSurface: TriangleSurface;
  waterTables: TriangleSurface[];
  inceptionSurfaces: TriangleSurface[];
  springs: EngineSpring[];
  sinks: EngineSink[];
  connectivityMatrix: ConnectivityMatrix;
}

export interface EngineResult {
  segments: number;
  /** Network in the engine's own text form */
  network: string;
}

export interface ValidationResult {
  errors: string[];
  warnings: string[];
  isValid: boolean;
}
