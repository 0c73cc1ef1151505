import fs from "node:fs/promises";
import path from "node:path";
import { createLogger, type Logger, type ResolvedConfig, type SkillManifest } from "@skillforge/core";
import { runProcess } from "./process.js";
import type { BuildJob, BuildResult } from "./types.js";

export function createBuildJob(manifest: SkillManifest, config: ResolvedConfig): BuildJob {
  return {
    skillName: manifest.name,
    skillDir: manifest.dir,
    entry: manifest.build.entry,
    binary: manifest.build.binary,
    stagingDir: config.stagingDir,
    command: [...config.buildCommand]
  };
}

function substitute(arg: string, vars: Record<string, string>): string {
  return arg.replace(/\{(output|entry|binary)\}/g, (_match, key: string) => vars[key] ?? "");
}

async function fileExists(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Compile a skill into the staging directory. A failed attempt is final; the
 * raw compiler output is returned either way.
 */
export async function buildSkill(job: BuildJob, log: Logger = createLogger("build")): Promise<BuildResult> {
  const outputPath = path.join(job.stagingDir, job.binary);

  try {
    await fs.mkdir(job.stagingDir, { recursive: true });
  } catch (err) {
    return {
      ok: false,
      error: `build failed: cannot create staging directory: ${err instanceof Error ? err.message : String(err)}`,
      output: ""
    };
  }

  const vars = { output: outputPath, entry: job.entry, binary: job.binary };
  const [command, ...args] = job.command.map((arg) => substitute(arg, vars));
  if (!command) {
    return { ok: false, error: "build failed: no build command configured", output: "" };
  }

  log.info(`building ${job.skillName}: ${[command, ...args].join(" ")} (cwd ${job.skillDir})`);
  const result = await runProcess(command, args, { cwd: job.skillDir });

  if (result.error) {
    log.error(`build of ${job.skillName} failed: ${result.error}`);
    return { ok: false, error: `build failed: ${result.error}`, output: result.output };
  }
  if (!(await fileExists(outputPath))) {
    return {
      ok: false,
      error: `build failed: compiler produced no artifact at ${outputPath}`,
      output: result.output
    };
  }

  log.info(`built ${outputPath}`);
  return { ok: true, binaryPath: outputPath, output: result.output };
}
