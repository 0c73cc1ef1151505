import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type {
  BuildConfig,
  ConfigValues,
  DeployConfig,
  DocsConfig,
  FileCopyRule,
  SkillManifest,
  SkillVariable,
  VariableType
} from "./types.js";
import { safeResolve } from "./utils/pathSafe.js";

export const MANIFEST_FILE = "skill.yaml";

const DEFAULT_TEMPLATE = "SKILL.template.md";
const DEFAULT_DOCS_OUTPUT = "SKILL.md";
const VARIABLE_TYPES: readonly VariableType[] = ["text", "secret", "json"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  return value;
}

function isVariableType(value: string): value is VariableType {
  return (VARIABLE_TYPES as readonly string[]).includes(value);
}

function normalizeVariable(raw: unknown, index: number): SkillVariable {
  if (!isRecord(raw)) {
    throw new Error(`variables[${index}] must be an object`);
  }
  const nameVal = raw["name"];
  if (!isNonEmptyString(nameVal)) {
    throw new Error(`variables[${index}].name must be a non-empty string`);
  }
  const name = nameVal.trim();

  const typeVal = optionalString(raw["type"], `variables[${index}].type`) ?? "text";
  if (!isVariableType(typeVal)) {
    throw new Error(`variables[${index}].type must be one of ${VARIABLE_TYPES.join(", ")} (got "${typeVal}")`);
  }

  const requiredVal = raw["required"] ?? false;
  if (typeof requiredVal !== "boolean") {
    throw new Error(`variables[${index}].required must be a boolean`);
  }

  const label = optionalString(raw["label"], `variables[${index}].label`);
  const variable: SkillVariable = {
    name,
    label: label && label.trim() ? label.trim() : name,
    description: optionalString(raw["description"], `variables[${index}].description`)?.trim() ?? "",
    required: requiredVal,
    type: typeVal
  };

  const placeholder = optionalString(raw["placeholder"], `variables[${index}].placeholder`);
  if (placeholder !== undefined) variable.placeholder = placeholder;
  const def = optionalString(raw["default"], `variables[${index}].default`);
  if (def !== undefined) variable.default = def;

  return variable;
}

function normalizeBuild(raw: unknown, name: string): BuildConfig {
  if (raw === undefined || raw === null) return { entry: ".", binary: name };
  if (!isRecord(raw)) throw new Error("build must be an object");
  const entry = optionalString(raw["entry"], "build.entry");
  const binary = optionalString(raw["binary"], "build.binary");
  return {
    entry: entry && entry.trim() ? entry.trim() : ".",
    binary: binary && binary.trim() ? binary.trim() : name
  };
}

function normalizeCopyRule(raw: unknown, index: number): FileCopyRule {
  if (typeof raw === "string" && raw.trim()) {
    return { from: raw.trim(), to: raw.trim() };
  }
  if (!isRecord(raw)) throw new Error(`deploy.files[${index}] must be a path or { from, to }`);
  const from = raw["from"];
  if (!isNonEmptyString(from)) throw new Error(`deploy.files[${index}].from must be a non-empty string`);
  const to = optionalString(raw["to"], `deploy.files[${index}].to`);
  return { from: from.trim(), to: to && to.trim() ? to.trim() : from.trim() };
}

function normalizeDeploy(raw: unknown): DeployConfig {
  if (raw === undefined || raw === null) return { files: [], wrapper: false };
  if (!isRecord(raw)) throw new Error("deploy must be an object");
  const files = raw["files"] ?? [];
  if (!Array.isArray(files)) throw new Error("deploy.files must be an array");
  const wrapper = raw["wrapper"] ?? false;
  if (typeof wrapper !== "boolean") throw new Error("deploy.wrapper must be a boolean");
  return { files: files.map(normalizeCopyRule), wrapper };
}

function normalizeDocs(raw: unknown): DocsConfig {
  if (raw === undefined || raw === null) return { template: DEFAULT_TEMPLATE, output: DEFAULT_DOCS_OUTPUT };
  if (!isRecord(raw)) throw new Error("docs must be an object");
  const template = optionalString(raw["template"], "docs.template");
  const output = optionalString(raw["output"], "docs.output");
  return {
    template: template && template.trim() ? template.trim() : DEFAULT_TEMPLATE,
    output: output && output.trim() ? output.trim() : DEFAULT_DOCS_OUTPUT
  };
}

export function normalizeManifest(raw: unknown, dir: string, manifestPath: string): SkillManifest {
  if (!isRecord(raw)) {
    throw new Error(`${MANIFEST_FILE} must be a YAML object`);
  }

  const nameVal = raw["name"];
  const descVal = raw["description"];
  if (!isNonEmptyString(nameVal)) {
    throw new Error("name must be a non-empty string");
  }
  if (!isNonEmptyString(descVal)) {
    throw new Error("description must be a non-empty string");
  }
  const name = nameVal.trim();

  const variablesVal = raw["variables"] ?? [];
  if (!Array.isArray(variablesVal)) {
    throw new Error("variables must be an array");
  }

  const manifest: SkillManifest = {
    dir,
    manifestPath,
    name,
    description: descVal.trim(),
    version: optionalString(raw["version"], "version")?.trim() ?? "0.0.0",
    variables: variablesVal.map(normalizeVariable),
    build: normalizeBuild(raw["build"], name),
    deploy: normalizeDeploy(raw["deploy"]),
    docs: normalizeDocs(raw["docs"])
  };

  const detailed = optionalString(raw["detailed_description"], "detailed_description");
  if (detailed && detailed.trim()) manifest.detailedDescription = detailed.trim();

  return manifest;
}

/**
 * Description used in generated metadata headers: the detailed description
 * when the manifest has one, otherwise the short one.
 */
export function skillDescription(manifest: SkillManifest): string {
  return manifest.detailedDescription ?? manifest.description;
}

/**
 * First required variable whose value is empty or blank, in manifest order.
 */
export function firstMissingRequired(manifest: SkillManifest, values: ConfigValues): SkillVariable | undefined {
  return manifest.variables.find((v) => v.required && (values[v.name] ?? "").trim() === "");
}

export async function parseManifest(skillDir: string): Promise<SkillManifest> {
  const dir = path.resolve(skillDir);
  const manifestPath = safeResolve(dir, MANIFEST_FILE);
  const text = await fs.readFile(manifestPath, "utf8");
  const raw: unknown = parseYaml(text);
  return normalizeManifest(raw, dir, manifestPath);
}
