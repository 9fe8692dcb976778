#!/usr/bin/env node
// Visual KARSYS → KarstNSim bridge CLI
// Usage: vk-karstnsim [options] <export.zip>

import { existsSync, statSync } from "node:fs";
import { parseCliArgs, USAGE } from "./args.js";
import { loadParameterFile, readEnv } from "./config.js";
import { PythonKarstEngine } from "./engine.js";
import { createStderrLogger } from "./log.js";
import type { SimulationOverrides } from "./model.js";
import { runBridge } from "./pipeline.js";

function printUsage(): void {
  process.stderr.write(USAGE);
}

async function main(): Promise<void> {
  let parsed;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    process.stderr.write(
      `Error: ${err instanceof Error ? err.message : String(err)}\n\n`
    );
    printUsage();
    process.exit(1);
  }

  if (parsed.help) {
    printUsage();
    process.exit(0);
  }

  if (!existsSync(parsed.zipPath) || !statSync(parsed.zipPath).isFile()) {
    process.stderr.write(`Error: The file ${parsed.zipPath} does not exist.\n`);
    process.exit(1);
  }

  const logger = createStderrLogger(parsed.verbose);
  const overrides: SimulationOverrides[] = [];
  if (parsed.paramsFile) overrides.push(loadParameterFile(parsed.paramsFile));
  overrides.push(parsed.overrides);

  const engine = new PythonKarstEngine({
    python: parsed.python ?? readEnv().pythonExecutable,
    logger,
  });

  await runBridge(parsed.zipPath, {
    outputPath: parsed.outputPath,
    debug: parsed.debug,
    debugDir: parsed.debugDir,
    dryRun: parsed.dryRun,
    overrides,
    engine,
    logger,
  });
}

main().catch((err) => {
  process.stderr.write(
    `Error: ${err instanceof Error ? err.message : String(err)}\n`
  );
  process.exit(1);
});
