import path from "node:path";
import type { SkillManifest } from "./types.js";

export type DeployTarget = {
  /** Base folder that holds deployed skills, e.g. ~/.claude/skills */
  baseFolder: string;
  /** Sub-folder created for this skill under the base folder */
  folderName: string;
};

export const ENV_FILE = ".env";

export function resolveDeployPath(target: DeployTarget): string {
  return path.join(target.baseFolder, target.folderName);
}

export function deployBinDir(deployPath: string): string {
  return path.join(deployPath, "bin");
}

export function deployedBinaryPath(deployPath: string, manifest: SkillManifest): string {
  return path.join(deployBinDir(deployPath), manifest.build.binary);
}

export function envFilePath(deployPath: string): string {
  return path.join(deployBinDir(deployPath), ENV_FILE);
}

export function docsPath(deployPath: string, manifest: SkillManifest): string {
  return path.join(deployPath, manifest.docs.output);
}

export function wrapperPath(deployPath: string, manifest: SkillManifest): string {
  return path.join(deployPath, `${manifest.build.binary}.sh`);
}

export function stagedBinaryPath(stagingDir: string, manifest: SkillManifest): string {
  return path.join(stagingDir, manifest.build.binary);
}
