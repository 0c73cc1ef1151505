export type VariableType = "text" | "secret" | "json";

export type SkillVariable = {
  name: string;
  label: string;
  description: string;
  required: boolean;
  placeholder?: string;
  default?: string;
  type: VariableType;
};

export type BuildConfig = {
  /** Source entry, relative to the skill directory. */
  entry: string;
  binary: string;
};

export type FileCopyRule = {
  from: string;
  to: string;
};

export type DeployConfig = {
  files: FileCopyRule[];
  wrapper: boolean;
};

export type DocsConfig = {
  template: string;
  output: string;
};

export type SkillManifest = {
  dir: string;
  manifestPath: string;
  name: string;
  description: string;
  detailedDescription?: string;
  version: string;
  variables: SkillVariable[];
  build: BuildConfig;
  deploy: DeployConfig;
  docs: DocsConfig;
};

export type SkillError = {
  name: string;
  dir: string;
  reason: string;
};

export type SkillCatalog = {
  manifests: SkillManifest[];
  errors: SkillError[];
};

export type ConfigValues = Readonly<Record<string, string>>;

export type FlagDescriptor = {
  names: string[];
  type?: string;
  description: string;
  required: boolean;
};

export type CommandNode = {
  name: string;
  /** Command tokens below the program, e.g. ["tasks", "create"]. */
  path: string[];
  description?: string;
  usage?: string;
  flags: FlagDescriptor[];
  children: CommandNode[];
};

export type LintIssue = {
  code: string;
  message: string;
  path?: string;
  severity: "error" | "warning";
};

export type LintResult = {
  ok: boolean;
  issues: LintIssue[];
};
