import { describe, it, expect } from "vitest";
import { DEFAULT_PARAMETERS } from "../src/config.js";
import { formatRunOutput, runInfoToJson } from "../src/serializer.js";

const INFO = {
  generationTime: new Date("2026-03-01T10:20:30.000Z"),
  generationDurationS: 1.5,
  computeResolution: { x: 20, y: 10, z: 5 },
};

describe("runInfoToJson", () => {
  it("writes metadata and camelCase parameters", () => {
    expect(JSON.parse(runInfoToJson(INFO, DEFAULT_PARAMETERS))).toEqual({
      metadata: {
        generationTime: "2026-03-01T10:20:30.000Z",
        generationDurationS: 1.5,
        computeResolution: { x: 20, y: 10, z: 5 },
      },
      config: {
        name: "Karst Network",
        seed: 42,
        kPts: 10,
        cohesionFactor: 0.9,
        nSinks: 100,
        searchRadius: "auto",
        inceptionSurfaceConstraintWeight: 1,
        maxInceptionSurfaceDistance: "auto",
        densitySamplingModifier: 2,
        rMinPervious: "auto",
        rMinImpervious: "auto",
      },
    });
  });
});

describe("formatRunOutput", () => {
  it("puts the run info before the network data", () => {
    const text = formatRunOutput(INFO, DEFAULT_PARAMETERS, "1 2 3\n4 5 6");
    const lines = text.split("\n");
    expect(lines[0]).toBe("# Run info");
    expect(lines[1]).toBe("{");
    expect(lines[2]).toBe('  "metadata": {');
    expect(lines.slice(-3)).toEqual(["# Data", "1 2 3", "4 5 6"]);
    expect(text.endsWith("\n")).toBe(false);
  });
});
