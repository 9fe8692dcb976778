// Test helpers: in-memory Visual KARSYS exports and a fake engine

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import AdmZip from "adm-zip";
import type { KarstEngine } from "../src/engine.js";
import type { Logger } from "../src/log.js";
import type { EngineInput, EngineResult, Vec3 } from "../src/model.js";

export function floatBuffer(values: number[]): Buffer {
  const buf = Buffer.alloc(values.length * 4);
  values.forEach((v, i) => buf.writeFloatLE(v, i * 4));
  return buf;
}

export function faultBuffer(vertices: Vec3[], triangles: Vec3[]): Buffer {
  const buf = Buffer.alloc(8 + 12 * vertices.length + 12 * triangles.length);
  let offset = 0;
  buf.writeInt32LE(vertices.length, offset);
  offset += 4;
  for (const v of vertices) {
    for (const c of v) {
      buf.writeFloatLE(c, offset);
      offset += 4;
    }
  }
  buf.writeInt32LE(triangles.length, offset);
  offset += 4;
  for (const t of triangles) {
    for (const c of t) {
      buf.writeInt32LE(c, offset);
      offset += 4;
    }
  }
  return buf;
}

/** 4x4 DEM, raw value at (row, col) = row * 10 + col. */
export const DEM_VALUES = [0, 1, 2, 3, 10, 11, 12, 13, 20, 21, 22, 23, 30, 31, 32, 33];

// 2x2x2 voxels: bottom layer limestone inside gwb 1, one marl voxel on top, rest sky
export const VOXELS_TXT = [
  "XMIN=0 XMAX=100 YMIN=0 YMAX=100 ZMIN=0 ZMAX=40 NUMBERX=2 NUMBERY=2 NUMBERZ=2 NOVALUE=0",
  "rank gwb_id",
  "1 1",
  "1 1",
  "1 1",
  "1 1",
  "2 0",
  "0 0",
  "0 0",
  "0 0",
  "",
].join("\n");

export const SQUARE_CATCHMENT: Array<[number, number]> = [
  [0, 0],
  [100, 0],
  [100, 100],
  [0, 100],
];

export type EntryValue = Buffer | string | object | null;

export function defaultEntries(): Record<string, EntryValue> {
  return {
    "config.json": { name: "Test Run", seed: 7, nSinks: 3 },
    "project_box.json": { width: 100, height: 100, min_elevation: 0, max_elevation: 40 },
    "dem_resolution.json": { n_cols: 4, n_rows: 4 },
    "dem_values.bin": floatBuffer(DEM_VALUES),
    "stratigraphy.json": [
      { name: "Limestone", permeability: "Karstified", stratiUnitId: 10 },
      { name: "Marl", permeability: "NonKarstified", stratiUnitId: 20 },
    ],
    "voxels.txt": VOXELS_TXT,
    "voxels_units.json": [10, 20],
    "poi_1.json": { poi_id: 1, x: 10, y: 10, z: 5, catchment: SQUARE_CATCHMENT },
    "gwb_1.json": { gwb_id: 1, spring_id: 1 },
    "fault_1.bin": faultBuffer(
      [
        [0, 0, 10],
        [100, 0, 10],
        [0, 100, 10],
      ],
      [[0, 1, 2]]
    ),
  };
}

/** Build an export ZIP; an entry set to null is left out. */
export function buildExport(overrides: Record<string, EntryValue> = {}): Buffer {
  const entries = { ...defaultEntries(), ...overrides };
  const zip = new AdmZip();
  for (const [name, value] of Object.entries(entries)) {
    if (value === null) continue;
    let data: Buffer;
    if (Buffer.isBuffer(value)) data = value;
    else if (typeof value === "string") data = Buffer.from(value, "utf-8");
    else data = Buffer.from(JSON.stringify(value), "utf-8");
    zip.addFile(name, data);
  }
  return zip.toBuffer();
}

export class FakeEngine implements KarstEngine {
  readonly inputs: EngineInput[] = [];
  readonly dumps: string[] = [];

  constructor(private readonly result: EngineResult = { segments: 2, network: "0 0 0 1 1 1" }) {}

  async run(input: EngineInput): Promise<EngineResult> {
    this.inputs.push(input);
    return this.result;
  }

  /** Writes one file per surface, named the way the runner names them. */
  async dump(input: EngineInput, dir: string): Promise<string[]> {
    this.dumps.push(dir);
    const surfaces: Array<[string, number]> = [
      ["debug_surface.txt", input.topoSurface.vertices.length],
      ...input.waterTables.map((s, i): [string, number] => [
        `debug_water_table_${i + 1}.txt`,
        s.vertices.length,
      ]),
    ];
    const paths: string[] = [];
    for (const [name, count] of surfaces) {
      const path = join(dir, name);
      await writeFile(path, `vertices ${count}\n`, "utf-8");
      paths.push(path);
    }
    return paths;
  }
}

export interface CapturingLogger extends Logger {
  infos: string[];
  warnings: string[];
}

export function capturingLogger(): CapturingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (m) => infos.push(m),
    warn: (m) => warnings.push(m),
    debug: () => undefined,
  };
}
