import { stringify as stringifyYaml } from "yaml";
import { formatFlagNames } from "./help-parser.js";
import { deployedBinaryPath } from "./layout.js";
import { skillDescription } from "./manifest.js";
import type { CommandNode, ConfigValues, SkillManifest } from "./types.js";

export const PLACEHOLDERS = {
  skillPath: "{{SKILL_PATH}}",
  commands: "{{COMMANDS}}"
} as const;

export type RenderDocsInput = {
  deployPath: string;
  manifest: SkillManifest;
  values: ConfigValues;
  commands: CommandNode[];
  /** Template text; the generated skeleton is used when absent. */
  template?: string;
};

function replaceAll(content: string, token: string, value: string): string {
  return content.split(token).join(value);
}

/**
 * Remove a leading `---` ... `---` metadata block and the blank lines after it.
 * Content without such a block is returned verbatim.
 */
export function stripFrontmatter(content: string): string {
  const lines = content.split("\n");
  if (lines[0]?.replace(/\r$/, "") !== "---") return content;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].replace(/\r$/, "") === "---") {
      return lines
        .slice(i + 1)
        .join("\n")
        .replace(/^(\r?\n)+/, "");
    }
  }
  return content;
}

export function renderFrontmatter(manifest: SkillManifest): string {
  const yamlText = stringifyYaml({ name: manifest.name, description: skillDescription(manifest) }, { lineWidth: 0 });
  return `---\n${yamlText}---\n\n`;
}

export function renderSkeleton(manifest: SkillManifest): string {
  return `# ${manifest.name}\n\n${manifest.description}\n\n## Commands\n\n${PLACEHOLDERS.commands}\n`;
}

export function tablePlaceholder(variableName: string): string {
  return `{{${variableName}_TABLE}}`;
}

/**
 * Markdown table for a JSON object of `name: id` pairs. Values that are not a
 * JSON object are shown raw.
 */
export function renderJsonTable(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return `Config: \`${raw}\``;
  }
  const rows = Object.entries(parsed).map(([name, id]) => {
    const idText = typeof id === "string" ? id : JSON.stringify(id);
    return `| ${idText} | ${name} |`;
  });
  return ["| ID | Name |", "|----|------|", ...rows].join("\n");
}

export function renderCommand(node: CommandNode, binaryPath: string): string {
  let out = `### ${node.path.join(" ")}\n\n`;
  if (node.description) {
    out += `${node.description}\n\n`;
  }
  if (node.usage) {
    out += `**Usage:** \`${binaryPath} ${node.usage}\`\n\n`;
  }
  if (node.flags.length > 0) {
    out += "**Flags:**\n";
    for (const flag of node.flags) {
      let line = `- \`${formatFlagNames(flag)}\``;
      if (flag.type) line += ` (${flag.type})`;
      if (flag.description) line += `: ${flag.description}`;
      out += `${line}\n`;
    }
    out += "\n";
  }
  return out;
}

function collectLeaves(nodes: CommandNode[]): CommandNode[] {
  const leaves: CommandNode[] = [];
  for (const node of nodes) {
    if (node.children.length === 0) leaves.push(node);
    else leaves.push(...collectLeaves(node.children));
  }
  return leaves;
}

export function renderCommandDocs(commands: CommandNode[], binaryPath: string): string {
  const docs = collectLeaves(commands)
    .map((leaf) => renderCommand(leaf, binaryPath))
    .join("");
  if (!docs) {
    return `Run \`${binaryPath} --help\` to see available commands.`;
  }
  return docs;
}

export function renderSkillDocs(input: RenderDocsInput): string {
  const { deployPath, manifest, values, commands } = input;
  let content = input.template !== undefined ? stripFrontmatter(input.template) : renderSkeleton(manifest);

  content = replaceAll(content, PLACEHOLDERS.skillPath, deployPath);

  for (const v of manifest.variables) {
    if (v.type !== "json") continue;
    const value = values[v.name];
    const table = value ? renderJsonTable(value) : `No ${v.label} configured.`;
    content = replaceAll(content, tablePlaceholder(v.name), table);
  }

  const binaryPath = deployedBinaryPath(deployPath, manifest);
  content = replaceAll(content, PLACEHOLDERS.commands, renderCommandDocs(commands, binaryPath));

  return renderFrontmatter(manifest) + content;
}
