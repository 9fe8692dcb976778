// stderr logging for the bridge

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

const PREFIX = "[vk-karstnsim]";

export function createStderrLogger(verbose: boolean = false): Logger {
  return {
    info: (message) => process.stderr.write(`${PREFIX} ${message}\n`),
    warn: (message) =>
      process.stderr.write(`  ${PREFIX} warning: ${message}\n`),
    debug: (message) => {
      if (verbose) process.stderr.write(`  ${PREFIX} debug: ${message}\n`);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
};
