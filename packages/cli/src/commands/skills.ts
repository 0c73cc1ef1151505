import { discoverSkills, type ResolvedConfig, type SkillManifest } from "@skillforge/core";

/**
 * Look a skill up by name among the discovered skills. Throws with the load
 * error when the skill exists but could not be loaded.
 */
export async function findSkill(config: ResolvedConfig, name: string): Promise<SkillManifest> {
  const catalog = await discoverSkills(config.skillsDir);
  const manifest = catalog.manifests.find((m) => m.name === name);
  if (manifest) return manifest;
  const failed = catalog.errors.find((e) => e.name === name);
  if (failed) {
    throw new Error(`Skill "${name}" failed to load: ${failed.reason}`);
  }
  throw new Error(`Unknown skill "${name}" in ${config.skillsDir}`);
}
