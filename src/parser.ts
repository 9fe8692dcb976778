// Visual KARSYS export reader
// Opens the ZIP, schema-checks each JSON entry and decodes the voxel and
// binary layers. No geometric checks here; see validator.ts.

import AdmZip from "adm-zip";
import { z } from "zod";
import {
  DEFAULT_PARAMETERS,
  camelizeKeys,
  formatIssues,
  mergeParameters,
  parseArchiveParameters,
} from "./config.js";
import { silentLogger, type Logger } from "./log.js";
import type {
  DemResolution,
  GeologicalUnit,
  GroundwaterBody,
  SimulationOverrides,
  TriangleSurface,
  Vec3,
  VkProject,
  VkProjectBox,
  VkSpring,
  VoxelGrid,
  VoxelsHeader,
} from "./model.js";

// --- Entry schemas ---

const finite = z.number().finite();

const ProjectBoxSchema = z.preprocess(
  camelizeKeys,
  z.object({
    width: finite,
    height: finite,
    minElevation: finite,
    maxElevation: finite,
  })
);

const DemResolutionSchema = z.preprocess(
  camelizeKeys,
  z.object({
    nCols: z.number().int().positive(),
    nRows: z.number().int().positive(),
  })
);

const StratigraphySchema = z.array(
  z.preprocess(
    camelizeKeys,
    z.object({
      name: z.string(),
      permeability: z.enum([
        "Karstified",
        "NonKarstified",
        "PorousPermeability",
        "Undefined",
      ]),
      stratiUnitId: z.number().int(),
    })
  )
);

const VoxelsUnitsSchema = z.array(z.number().int());

const SpringSchema = z.preprocess(
  camelizeKeys,
  z.object({
    poiId: z.number().int(),
    x: finite,
    y: finite,
    z: finite,
    catchment: z.array(z.tuple([finite, finite])).default([]),
  })
);

const GroundwaterBodySchema = z.preprocess(
  camelizeKeys,
  z.object({
    gwbId: z.number().int(),
    springId: z.number().int(),
  })
);

// --- Voxels ---

const VOXEL_HEADER_KEYS = [
  "XMIN",
  "XMAX",
  "YMIN",
  "YMAX",
  "ZMIN",
  "ZMAX",
  "NUMBERX",
  "NUMBERY",
  "NUMBERZ",
  "NOVALUE",
] as const;

function parseVoxelsHeader(line: string): VoxelsHeader {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length !== VOXEL_HEADER_KEYS.length) {
    throw new Error(
      `Malformed voxel header line (expected ${VOXEL_HEADER_KEYS.length} tokens, found ${tokens.length})`
    );
  }
  const values = new Map<string, number>();
  for (const token of tokens) {
    const eq = token.indexOf("=");
    const value = eq === -1 ? NaN : Number(token.slice(eq + 1));
    if (eq === -1 || !Number.isFinite(value)) {
      throw new Error(`Malformed voxel header token '${token}'`);
    }
    values.set(token.slice(0, eq).toUpperCase(), value);
  }
  const get = (key: (typeof VOXEL_HEADER_KEYS)[number]): number => {
    const v = values.get(key);
    if (v === undefined) throw new Error(`Voxel header is missing ${key}`);
    return v;
  };
  const integer = (key: (typeof VOXEL_HEADER_KEYS)[number]): number => {
    const v = get(key);
    if (!Number.isInteger(v)) {
      throw new Error(`Voxel header ${key} must be an integer, got ${v}`);
    }
    return v;
  };
  const header: VoxelsHeader = {
    xmin: get("XMIN"),
    xmax: get("XMAX"),
    ymin: get("YMIN"),
    ymax: get("YMAX"),
    zmin: get("ZMIN"),
    zmax: get("ZMAX"),
    nx: integer("NUMBERX"),
    ny: integer("NUMBERY"),
    nz: integer("NUMBERZ"),
    novalue: integer("NOVALUE"),
  };
  if (header.nx < 1 || header.ny < 1 || header.nz < 1) {
    throw new Error(
      `Voxel grid dimensions must be positive (got ${header.nx}x${header.ny}x${header.nz})`
    );
  }
  return header;
}

/**
 * Parse voxels.txt: a KEY=value header, a caption line, then one
 * "rank gwb_id" line per voxel with x varying fastest, then y, then z.
 */
export function parseVoxels(text: string): VoxelGrid {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  if (lines.length < 3) {
    throw new Error("Voxel file must have at least 3 lines");
  }

  const header = parseVoxelsHeader(lines[0]);
  const count = header.nx * header.ny * header.nz;
  const dataLines = lines.length - 2;
  if (count !== dataLines) {
    throw new Error(
      `Voxel count mismatch: header says ${count}, but found ${dataLines} data lines`
    );
  }

  const ranks = new Int32Array(count);
  const gwbIds = new Int32Array(count);
  for (let i = 0; i < count; i++) {
    const lineNo = i + 2;
    const parts = lines[lineNo].split(/\s+/);
    if (parts.length !== 2) {
      throw new Error(`Malformed voxel data line ${lineNo + 1} (expected 2 tokens)`);
    }
    const rank = Number(parts[0]);
    const gwbId = Number(parts[1]);
    if (!Number.isInteger(rank) || !Number.isInteger(gwbId)) {
      throw new Error(`Malformed voxel data line ${lineNo + 1} (expected integers)`);
    }
    ranks[i] = rank;
    gwbIds[i] = gwbId;
  }
  return { header, ranks, gwbIds };
}

export function voxelIndex(
  header: VoxelsHeader,
  ix: number,
  iy: number,
  iz: number
): number {
  return ix + header.nx * (iy + header.ny * iz);
}

// --- Binary layers ---

/**
 * Decode a fault_* entry: int32 vertex count, float32 xyz triples,
 * int32 triangle count, int32 index triples. Little-endian.
 */
export function parseFault(data: Buffer, entryName: string = "fault"): TriangleSurface {
  const fail = (why: string): never => {
    throw new Error(`Malformed fault file ${entryName}: ${why}`);
  };
  let offset = 0;
  const need = (bytes: number): void => {
    if (offset + bytes > data.length) fail("unexpected end of data");
  };

  need(4);
  const nVertices = data.readInt32LE(offset);
  offset += 4;
  if (nVertices < 0) fail(`negative vertex count ${nVertices}`);
  need(12 * nVertices);
  const vertices: Vec3[] = [];
  for (let i = 0; i < nVertices; i++) {
    vertices.push([
      data.readFloatLE(offset),
      data.readFloatLE(offset + 4),
      data.readFloatLE(offset + 8),
    ]);
    offset += 12;
  }

  need(4);
  const nTriangles = data.readInt32LE(offset);
  offset += 4;
  if (nTriangles < 0) fail(`negative triangle count ${nTriangles}`);
  need(12 * nTriangles);
  const triangles: Vec3[] = [];
  for (let i = 0; i < nTriangles; i++) {
    triangles.push([
      data.readInt32LE(offset),
      data.readInt32LE(offset + 4),
      data.readInt32LE(offset + 8),
    ]);
    offset += 12;
  }

  if (offset !== data.length) fail("extra data at the end");
  return { vertices, triangles };
}

/** Decode dem_values.bin (little-endian float32). */
export function parseDemValues(data: Buffer): Float32Array {
  if (data.length % 4 !== 0) {
    throw new Error(`DEM data length ${data.length} is not a multiple of 4 bytes`);
  }
  const values = new Float32Array(data.length / 4);
  for (let i = 0; i < values.length; i++) {
    values[i] = data.readFloatLE(i * 4);
  }
  return values;
}

// --- Archive ---

export interface ReadArchiveOptions {
  overrides?: SimulationOverrides[];
  logger?: Logger;
}

class ExportArchive {
  private readonly zip: AdmZip;
  readonly names: string[];

  constructor(source: string | Buffer) {
    this.zip = new AdmZip(source);
    this.names = this.zip
      .getEntries()
      .filter((e) => !e.isDirectory)
      .map((e) => e.entryName);
  }

  has(name: string): boolean {
    return this.zip.getEntry(name) !== null;
  }

  read(name: string): Buffer {
    const entry = this.zip.getEntry(name);
    if (!entry || entry.isDirectory) {
      throw new Error(`The export does not contain ${name}`);
    }
    return entry.getData();
  }

  readJson(name: string): unknown {
    try {
      return JSON.parse(this.read(name).toString("utf-8"));
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new Error(`${name} is not valid JSON: ${err.message}`);
      }
      throw err;
    }
  }

  readEntry<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const result = schema.safeParse(this.readJson(name));
    if (!result.success) {
      throw new Error(`Invalid ${name}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  /** Top-level entries whose name starts with prefix, in name order. */
  withPrefix(prefix: string): string[] {
    return this.names.filter((n) => n.startsWith(prefix)).sort();
  }
}

/**
 * Read a Visual KARSYS export from a path or an in-memory ZIP.
 * Parameter overrides are applied on top of config.json in the given order.
 */
export function readArchive(
  source: string | Buffer,
  options: ReadArchiveOptions = {}
): VkProject {
  const { overrides = [], logger = silentLogger } = options;
  const archive = new ExportArchive(source);

  let parameters = DEFAULT_PARAMETERS;
  if (archive.has("config.json")) {
    parameters = parseArchiveParameters(archive.readJson("config.json"));
  } else {
    logger.warn("The export does not contain a config.json file, using defaults");
  }
  for (const layer of overrides) {
    if (Object.keys(layer).length > 0) {
      logger.info(`Applying parameter overrides: ${JSON.stringify(layer)}`);
    }
  }
  parameters = mergeParameters(parameters, ...overrides);

  const projectBox: VkProjectBox = archive.readEntry("project_box.json", ProjectBoxSchema);
  const demResolution: DemResolution = archive.readEntry(
    "dem_resolution.json",
    DemResolutionSchema
  );
  const demValues = parseDemValues(archive.read("dem_values.bin"));
  logger.info(`Loaded surface data of length ${demValues.length * 4} bytes`);

  const stratigraphy: GeologicalUnit[] = archive.readEntry(
    "stratigraphy.json",
    StratigraphySchema
  );

  let voxels: VoxelGrid;
  try {
    voxels = parseVoxels(archive.read("voxels.txt").toString("ascii"));
  } catch (err) {
    throw new Error(
      `voxels.txt: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const h = voxels.header;
  logger.info(`Loaded voxel grid ${h.nx}x${h.ny}x${h.nz}`);

  const voxelsUnits = archive.readEntry("voxels_units.json", VoxelsUnitsSchema);
  logger.debug(`Voxel units: ${voxelsUnits.join(", ")}`);

  const springs: VkSpring[] = archive
    .withPrefix("poi_")
    .map((name) => archive.readEntry(name, SpringSchema));
  logger.info(`Loaded ${springs.length} springs from POI files.`);

  const groundwaterBodies: GroundwaterBody[] = archive
    .withPrefix("gwb_")
    .map((name) => archive.readEntry(name, GroundwaterBodySchema));
  logger.info(`Loaded ${groundwaterBodies.length} groundwater bodies from GWB files.`);

  const faults: TriangleSurface[] = archive.withPrefix("fault_").map((name) => {
    const fault = parseFault(archive.read(name), name);
    logger.debug(
      `${name}: ${fault.vertices.length} vertices, ${fault.triangles.length} triangles`
    );
    return fault;
  });
  logger.info(`Loaded ${faults.length} faults from fault files.`);

  return {
    parameters,
    projectBox,
    demResolution,
    demValues,
    stratigraphy,
    voxels,
    voxelsUnits,
    springs,
    groundwaterBodies,
    faults,
  };
}
