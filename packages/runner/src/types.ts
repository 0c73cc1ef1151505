import type { CommandNode, ConfigValues, SkillManifest } from "@skillforge/core";

export type ProcessResult = {
  /** null when the process was killed or never started */
  code: number | null;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  error?: string;
};

export type RunProcessOptions = {
  cwd?: string;
  timeout?: number;
  env?: NodeJS.ProcessEnv;
};

export type BuildJob = {
  skillName: string;
  skillDir: string;
  entry: string;
  binary: string;
  stagingDir: string;
  command: string[];
};

export type BuildResult =
  | { ok: true; binaryPath: string; output: string }
  | { ok: false; error: string; output: string };

export type DeployJob = {
  manifest: SkillManifest;
  stagedBinary: string;
  stagingDir: string;
  deployPath: string;
  values: ConfigValues;
  helpTimeoutMs: number;
};

export type DeployResult =
  | { ok: true; deployPath: string; written: string[]; commands: CommandNode[] }
  | { ok: false; error: string; written: string[] };

/**
 * Returns the help output for `args`, or rejects when it cannot be obtained.
 */
export type HelpSource = (args: string[]) => Promise<string>;
