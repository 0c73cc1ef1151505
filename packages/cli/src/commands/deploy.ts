import fs from "node:fs";
import {
  createLogger,
  deployedBinaryPath,
  firstMissingRequired,
  hasLineBreak,
  resolveDeployPath,
  type ConfigValues,
  type ResolvedConfig,
  type SkillManifest
} from "@skillforge/core";
import { buildSkill, createBuildJob, createDeployJob, deploySkill } from "@skillforge/runner";
import { findSkill } from "./skills.js";

export type DeployCommandOptions = {
  target: string;
  name?: string;
  env?: string[];
  fromEnv?: boolean;
  force?: boolean;
};

export type DeployCommandResult =
  | { ok: true; deployPath: string; written: string[] }
  | { ok: false; stage: "build" | "deploy"; error: string; output?: string };

/**
 * Values for a non-interactive deploy: manifest defaults, then the process
 * environment when `fromEnv` is set, then explicit KEY=VALUE pairs.
 */
export function collectValues(
  manifest: SkillManifest,
  pairs: readonly string[],
  fromEnv: boolean,
  env: NodeJS.ProcessEnv = process.env
): ConfigValues {
  const known = new Set(manifest.variables.map((v) => v.name));
  const values: Record<string, string> = {};

  for (const v of manifest.variables) {
    if (v.default !== undefined) values[v.name] = v.default;
    const fromProcess = env[v.name];
    if (fromEnv && fromProcess !== undefined) values[v.name] = fromProcess;
  }

  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new Error(`Expected KEY=VALUE, got "${pair}"`);
    }
    const key = pair.slice(0, eq);
    if (!known.has(key)) {
      throw new Error(`Unknown variable "${key}" for skill ${manifest.name}`);
    }
    values[key] = pair.slice(eq + 1);
  }

  for (const [key, value] of Object.entries(values)) {
    if (hasLineBreak(value)) {
      throw new Error(`Value of ${key} must not contain line breaks`);
    }
  }

  return values;
}

/**
 * Build and deploy a skill without the wizard. Runs the same build and deploy
 * steps the wizard runs.
 */
export async function deployCommand(
  config: ResolvedConfig,
  skillName: string,
  opts: DeployCommandOptions
): Promise<DeployCommandResult> {
  const manifest = await findSkill(config, skillName);
  const values = collectValues(manifest, opts.env ?? [], opts.fromEnv ?? false);

  const missing = firstMissingRequired(manifest, values);
  if (missing) {
    throw new Error(`${missing.label} (${missing.name}) is required`);
  }

  const deployPath = resolveDeployPath({ baseFolder: opts.target, folderName: opts.name ?? manifest.name });
  const existing = deployedBinaryPath(deployPath, manifest);
  if (!opts.force && fs.existsSync(existing)) {
    throw new Error(`${manifest.name} is already deployed at ${deployPath} (use --force to overwrite)`);
  }

  const log = createLogger("deploy");
  const built = await buildSkill(createBuildJob(manifest, config), log.child("build"));
  if (!built.ok) {
    return { ok: false, stage: "build", error: built.error, output: built.output };
  }

  const job = { ...createDeployJob(manifest, config, deployPath, values), stagedBinary: built.binaryPath };
  const deployed = await deploySkill(job, { log });
  if (!deployed.ok) {
    return { ok: false, stage: "deploy", error: deployed.error };
  }
  return { ok: true, deployPath: deployed.deployPath, written: deployed.written };
}
