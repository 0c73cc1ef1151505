import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { MANIFEST_FILE, parseManifest } from "./manifest.js";
import { lintManifest } from "./lint.js";
import type { SkillCatalog, SkillError, SkillManifest } from "./types.js";

/**
 * Check if a directory contains a skill manifest
 */
async function isSkillDirectory(dir: string): Promise<boolean> {
  try {
    const stat = await fs.stat(path.join(dir, MANIFEST_FILE));
    return stat.isFile();
  } catch {
    return false;
  }
}

type LoadOutcome = { ok: true; manifest: SkillManifest } | { ok: false; error: SkillError };

/**
 * Load one skill directory into exactly one outcome: a manifest that passed
 * lint, or the reason it did not.
 */
export async function loadSkill(skillDir: string): Promise<LoadOutcome> {
  const dir = path.resolve(skillDir);
  const fallbackName = path.basename(dir);
  try {
    const manifest = await parseManifest(dir);
    const lint = lintManifest(manifest);
    const errors = lint.issues.filter((i) => i.severity === "error");
    if (errors.length > 0) {
      return {
        ok: false,
        error: { name: manifest.name, dir, reason: errors.map((e) => e.message).join("; ") }
      };
    }
    return { ok: true, manifest };
  } catch (err) {
    return {
      ok: false,
      error: { name: fallbackName, dir, reason: err instanceof Error ? err.message : String(err) }
    };
  }
}

/**
 * Discover every skill under `skillsDir`. Subdirectories without a manifest
 * are not skills and are skipped; a directory that fails to load is reported
 * in `errors` and never stops the scan. A name already taken by an earlier
 * directory is reported the same way. A missing `skillsDir` yields an
 * empty catalog.
 */
export async function discoverSkills(skillsDir: string): Promise<SkillCatalog> {
  const resolvedDir = path.resolve(skillsDir);

  let entries: Dirent[];
  try {
    entries = await fs.readdir(resolvedDir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { manifests: [], errors: [] };
    }
    throw err;
  }

  const skillDirs: string[] = [];
  const names = entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));
  for (const name of names) {
    const subDir = path.join(resolvedDir, name);
    if (await isSkillDirectory(subDir)) {
      skillDirs.push(subDir);
    }
  }

  const outcomes = await Promise.all(skillDirs.map((dir) => loadSkill(dir)));

  const catalog: SkillCatalog = { manifests: [], errors: [] };
  const seen = new Map<string, string>();
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      catalog.errors.push(outcome.error);
      continue;
    }
    const { manifest } = outcome;
    const firstDir = seen.get(manifest.name);
    if (firstDir !== undefined) {
      catalog.errors.push({
        name: manifest.name,
        dir: manifest.dir,
        reason: `duplicate skill name "${manifest.name}" (already declared in ${firstDir})`
      });
      continue;
    }
    seen.set(manifest.name, manifest.dir);
    catalog.manifests.push(manifest);
  }
  return catalog;
}
