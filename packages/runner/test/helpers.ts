import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { normalizeManifest, type ResolvedConfig, type SkillManifest } from "@skillforge/core";

export const FAKE_COMPILER = fileURLToPath(new URL("./fixtures/fake-compiler.cjs", import.meta.url));

export async function mkTmpDir(prefix = "skillforge-runner-") {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testConfig(root: string): ResolvedConfig {
  return {
    root,
    skillsDir: path.join(root, "skills"),
    stagingDir: path.join(root, "dist"),
    buildCommand: [process.execPath, FAKE_COMPILER, "{output}", "{entry}"],
    helpTimeoutMs: 5000,
    logLevel: "silent"
  };
}

export async function writeTasksSkill(root: string, raw: Record<string, unknown> = {}): Promise<SkillManifest> {
  const dir = path.join(root, "skills", "tasks");
  await fs.mkdir(dir, { recursive: true });
  return normalizeManifest(
    {
      name: "tasks",
      description: "Manage tasks",
      variables: [
        { name: "API_TOKEN", label: "API Token", type: "secret", required: true },
        { name: "PROJECTS", label: "Projects", type: "json" },
        { name: "REGION", label: "Region" }
      ],
      build: { entry: ".", binary: "tasks-cli" },
      ...raw
    },
    dir,
    path.join(dir, "skill.yaml")
  );
}
