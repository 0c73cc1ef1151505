import path from "node:path";
import { lintSkill, type LintResult } from "@skillforge/core";

export async function lintCommand(dir: string): Promise<LintResult> {
  return lintSkill(path.resolve(process.cwd(), dir));
}
