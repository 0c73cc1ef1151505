import path from "node:path";
import { parseManifest, MANIFEST_FILE } from "./manifest.js";
import type { LintIssue, LintResult, SkillManifest } from "./types.js";

const NAME_RE = /^[a-z0-9][a-z0-9-_]{1,64}$/;
const SEMVER_RE = /^\d+\.\d+\.\d+(-[\w.-]+)?$/;
const ENV_NAME_RE = /^[A-Z_][A-Z0-9_]*$/;

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

export function lintManifest(manifest: SkillManifest): LintResult {
  const issues: LintIssue[] = [];

  if (!NAME_RE.test(manifest.name)) {
    issues.push({
      code: "NAME_INVALID",
      message: "name must be kebab-case (a-z0-9-_)",
      path: MANIFEST_FILE,
      severity: "error"
    });
  }
  if (!SEMVER_RE.test(manifest.version)) {
    issues.push({
      code: "VERSION_INVALID",
      message: "version must be semver (x.y.z)",
      path: MANIFEST_FILE,
      severity: "warning"
    });
  }

  const seen = new Set<string>();
  for (const v of manifest.variables) {
    if (!ENV_NAME_RE.test(v.name)) {
      issues.push({
        code: "VARIABLE_NAME_INVALID",
        message: `variable ${v.name} must be an environment identifier (A-Z0-9_)`,
        path: MANIFEST_FILE,
        severity: "error"
      });
    }
    if (seen.has(v.name)) {
      issues.push({
        code: "VARIABLE_DUPLICATE",
        message: `variable ${v.name} is declared more than once`,
        path: MANIFEST_FILE,
        severity: "error"
      });
    }
    seen.add(v.name);
    if (v.type === "json" && v.default !== undefined && !isJson(v.default)) {
      issues.push({
        code: "VARIABLE_DEFAULT_JSON",
        message: `default of ${v.name} is not valid JSON`,
        path: MANIFEST_FILE,
        severity: "warning"
      });
    }
  }

  const binary = manifest.build.binary;
  if (binary.includes("/") || binary.includes("\\") || binary === "." || binary === "..") {
    issues.push({
      code: "BINARY_NAME_INVALID",
      message: `build.binary must be a plain file name (got "${binary}")`,
      path: MANIFEST_FILE,
      severity: "error"
    });
  }
  if (path.basename(manifest.docs.output) !== manifest.docs.output) {
    issues.push({
      code: "DOCS_OUTPUT_INVALID",
      message: `docs.output must be a plain file name (got "${manifest.docs.output}")`,
      path: MANIFEST_FILE,
      severity: "error"
    });
  }

  const ok = issues.every((i) => i.severity !== "error");
  return { ok, issues };
}

export async function lintSkill(skillDir: string): Promise<LintResult> {
  let manifest: SkillManifest;
  try {
    manifest = await parseManifest(skillDir);
  } catch (err) {
    return {
      ok: false,
      issues: [
        {
          code: "MANIFEST_PARSE",
          message: err instanceof Error ? err.message : `Failed to parse ${MANIFEST_FILE}`,
          path: MANIFEST_FILE,
          severity: "error"
        }
      ]
    };
  }
  return lintManifest(manifest);
}
