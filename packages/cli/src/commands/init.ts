import fs from "node:fs/promises";
import path from "node:path";
import { MANIFEST_FILE, PLACEHOLDERS } from "@skillforge/core";

function assertNoTraversal(p: string) {
  const norm = p.replace(/\\/g, "/").split("/").filter(Boolean);
  if (norm.some((s) => s === "..")) throw new Error("Path traversal not allowed");
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function initSkill(dir: string): Promise<string> {
  assertNoTraversal(dir);
  const root = path.resolve(process.cwd(), dir);
  const manifestPath = path.join(root, MANIFEST_FILE);
  if (await exists(manifestPath)) {
    throw new Error(`${manifestPath} already exists`);
  }
  await fs.mkdir(root, { recursive: true });

  const name = path.basename(root);
  const manifest = `name: ${name}
description: Describe your skill.
version: 0.1.0

variables:
  - name: API_TOKEN
    label: API Token
    description: Token used to call the service
    type: secret
    required: true

build:
  entry: .
  binary: ${name}

deploy:
  wrapper: false
  files: []

docs:
  template: SKILL.template.md
  output: SKILL.md
`;
  const template = `# ${name}

What this skill does and when to use it.

Binary: \`${PLACEHOLDERS.skillPath}/bin/${name}\`

## Commands

${PLACEHOLDERS.commands}
`;
  await fs.writeFile(manifestPath, manifest, "utf8");
  await fs.writeFile(path.join(root, "SKILL.template.md"), template, "utf8");
  return root;
}
