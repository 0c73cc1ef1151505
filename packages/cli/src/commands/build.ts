import { createLogger, type ResolvedConfig } from "@skillforge/core";
import { buildSkill, createBuildJob, type BuildResult } from "@skillforge/runner";
import { findSkill } from "./skills.js";

export async function buildCommand(config: ResolvedConfig, skillName: string): Promise<BuildResult> {
  const manifest = await findSkill(config, skillName);
  return buildSkill(createBuildJob(manifest, config), createLogger("build"));
}
