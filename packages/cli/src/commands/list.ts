import { discoverSkills, type ResolvedConfig, type SkillCatalog } from "@skillforge/core";

export async function listCommand(config: ResolvedConfig): Promise<SkillCatalog> {
  return discoverSkills(config.skillsDir);
}
