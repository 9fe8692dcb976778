// vk-karstnsim bridge: public library surface
// Import this to convert Visual KARSYS exports or drive KarstNSim from your own code.

export { readArchive, parseVoxels, parseFault, parseDemValues } from "./parser.js";
export { validateProject } from "./validator.js";
export {
  DEFAULT_PARAMETERS,
  loadParameterFile,
  mergeParameters,
  parseArchiveParameters,
  parseParameterOverrides,
} from "./config.js";
export { prepareEngineInput, runBridge, computeResolution } from "./pipeline.js";
export {
  PythonKarstEngine,
  buildEngineConfig,
  toEnginePayload,
  parseEngineResult,
} from "./engine.js";
export { formatRunOutput, runInfoToJson } from "./serializer.js";
export { createStderrLogger, silentLogger } from "./log.js";
export type { Logger } from "./log.js";
export type { KarstEngine, PythonKarstEngineOptions } from "./engine.js";
export type { BridgeOptions, BridgeRun } from "./pipeline.js";
export type { RunInfo } from "./serializer.js";
export type {
  SimulationParameters,
  SimulationOverrides,
  VkProject,
  EngineInput,
  EngineResult,
  EngineConfig,
  TriangleSurface,
  ProjectBoxGrid,
  ValidationResult,
} from "./model.js";
