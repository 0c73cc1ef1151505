import fs from "node:fs/promises";
import path from "node:path";
import { existsSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "./logger.js";

export const CONFIG_FILE = "skillforge.config.yaml";

export const DEFAULT_BUILD_COMMAND = ["go", "build", "-o", "{output}", "{entry}"];

export const SkillforgeConfigSchema = z.object({
  /** Directory scanned for skill folders, relative to the project root */
  skillsDir: z.string().min(1).default("skills"),
  /** Build output location, removed after a successful deploy */
  stagingDir: z.string().min(1).default("dist"),
  /** Compiler invocation; {output}, {entry} and {binary} are substituted */
  buildCommand: z.array(z.string().min(1)).min(1).default(DEFAULT_BUILD_COMMAND),
  /** Per-invocation limit when running a binary with --help */
  helpTimeoutMs: z.number().int().positive().default(10_000),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /** Pre-fills the Skills Folder input of the wizard */
  defaultDeployFolder: z.string().optional()
});

export type SkillforgeConfig = z.infer<typeof SkillforgeConfigSchema>;

export type ResolvedConfig = {
  root: string;
  skillsDir: string;
  stagingDir: string;
  buildCommand: string[];
  helpTimeoutMs: number;
  logLevel: LogLevel;
  defaultDeployFolder?: string;
};

export type ConfigOverrides = {
  skillsDir?: string;
  logLevel?: LogLevel;
};

/**
 * Walk up from `start` looking for a config file or a skills/ directory.
 * Falls back to `start` itself.
 */
export function findProjectRoot(start: string = process.cwd()): string {
  let dir = path.resolve(start);
  for (let i = 0; i < 10; i++) {
    if (existsSync(path.join(dir, CONFIG_FILE)) || existsSync(path.join(dir, "skills"))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(start);
}

async function readConfigFile(root: string): Promise<unknown> {
  const file = path.join(root, CONFIG_FILE);
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw err;
  }
  const raw: unknown = parseYaml(text);
  return raw ?? {};
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  const skillsDir = env.SKILLFORGE_SKILLS_DIR;
  if (skillsDir) out.skillsDir = skillsDir;
  const level = env.SKILLFORGE_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) out.logLevel = level;
  return out;
}

/**
 * Resolve configuration: defaults < skillforge.config.yaml < environment < CLI.
 */
export async function loadConfig(
  root: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<ResolvedConfig> {
  const resolvedRoot = path.resolve(root);
  const fileConfig = await readConfigFile(resolvedRoot);
  if (typeof fileConfig !== "object" || fileConfig === null || Array.isArray(fileConfig)) {
    throw new Error(`${CONFIG_FILE} must be a YAML object`);
  }

  const cliOverrides = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const merged = { ...fileConfig, ...envOverrides(env), ...cliOverrides };
  const result = SkillforgeConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Invalid ${CONFIG_FILE}: ${details}`);
  }

  const config = result.data;
  const resolved: ResolvedConfig = {
    root: resolvedRoot,
    skillsDir: path.resolve(resolvedRoot, config.skillsDir),
    stagingDir: path.resolve(resolvedRoot, config.stagingDir),
    buildCommand: config.buildCommand,
    helpTimeoutMs: config.helpTimeoutMs,
    logLevel: config.logLevel
  };
  if (config.defaultDeployFolder) resolved.defaultDeployFolder = config.defaultDeployFolder;
  return resolved;
}
