import path from "node:path";
import {
  configureLogging,
  findProjectRoot,
  isLogLevel,
  loadConfig,
  type ConfigOverrides,
  type ResolvedConfig
} from "@skillforge/core";

export const VERSION = "0.1.0";

export type GlobalOptions = {
  root?: string;
  logLevel?: string;
};

/**
 * Resolve the project configuration for a command and point logging at
 * stderr, or at `logFile` when one is given.
 */
export async function resolveContext(opts: GlobalOptions, logFile?: (root: string) => string): Promise<ResolvedConfig> {
  const overrides: ConfigOverrides = {};
  if (opts.logLevel !== undefined) {
    const level = opts.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new Error(`Unknown log level "${opts.logLevel}"`);
    }
    overrides.logLevel = level;
  }

  const root = opts.root ? path.resolve(opts.root) : findProjectRoot();
  const config = await loadConfig(root, overrides);
  configureLogging({ level: config.logLevel, file: logFile?.(config.root) });
  return config;
}
