import type { ConfigValues, DeployTarget, SkillCatalog, SkillManifest } from "@skillforge/core";
import type { BuildResult, DeployResult } from "@skillforge/runner";
import type { KeyPress } from "./keys.js";
import type { TextInput } from "./text-input.js";

/**
 * Data that outlives a single screen: discovered skills, values typed so far
 * and the deploy target last entered for each skill.
 */
export type WizardSession = {
  readonly version: string;
  readonly catalog: SkillCatalog;
  readonly values: ConfigValues;
  readonly targets: Readonly<Record<string, DeployTarget>>;
  readonly lastBaseFolder?: string;
};

export type SelectSkillScreen = {
  readonly mode: "select-skill";
  readonly cursor: number;
  readonly error?: string;
};

export type ConfigureVariablesScreen = {
  readonly mode: "configure-variables";
  readonly manifest: SkillManifest;
  readonly inputs: readonly TextInput[];
  readonly focus: number;
  readonly error?: string;
};

export type ConfigureDeployTargetScreen = {
  readonly mode: "configure-deploy-target";
  readonly manifest: SkillManifest;
  /** [skills folder, skill name] */
  readonly inputs: readonly [TextInput, TextInput];
  readonly focus: number;
  readonly error?: string;
};

export type ConfirmScreen = {
  readonly mode: "confirm";
  readonly manifest: SkillManifest;
  readonly target: DeployTarget;
  readonly deployPath: string;
};

export type OverwriteWarningScreen = {
  readonly mode: "overwrite-warning";
  readonly manifest: SkillManifest;
  readonly target: DeployTarget;
  readonly deployPath: string;
};

export type BuildingScreen = {
  readonly mode: "building";
  readonly manifest: SkillManifest;
  readonly deployPath: string;
  readonly phase: "compiling" | "deploying";
  readonly buildOutput?: string;
};

export type DoneOutcome =
  | { readonly ok: true; readonly message: string }
  | { readonly ok: false; readonly error: string; readonly output?: string };

export type DoneScreen = {
  readonly mode: "done";
  readonly manifest: SkillManifest;
  readonly deployPath: string;
  readonly outcome: DoneOutcome;
};

export type Screen =
  | SelectSkillScreen
  | ConfigureVariablesScreen
  | ConfigureDeployTargetScreen
  | ConfirmScreen
  | OverwriteWarningScreen
  | BuildingScreen
  | DoneScreen;

export type WizardMode = Screen["mode"];

export type WizardState = {
  readonly session: WizardSession;
  readonly screen: Screen;
};

export type WizardEvent =
  | { type: "key"; key: KeyPress }
  | { type: "build-complete"; result: BuildResult }
  | { type: "deploy-complete"; result: DeployResult };

/**
 * Work the driver performs outside the reducer. Values are copied at the
 * time the effect is produced.
 */
export type WizardEffect =
  | { type: "build"; manifest: SkillManifest }
  | {
      type: "deploy";
      manifest: SkillManifest;
      stagedBinary: string;
      deployPath: string;
      values: ConfigValues;
    }
  | { type: "quit" };

export type Transition = {
  state: WizardState;
  effects: WizardEffect[];
};

export type WizardEnv = {
  /** True when a file exists at the given path. */
  artifactExists(path: string): boolean;
};

export function createInitialState(options: {
  version: string;
  catalog: SkillCatalog;
  defaultDeployFolder?: string;
}): WizardState {
  const session: WizardSession = {
    version: options.version,
    catalog: options.catalog,
    values: {},
    targets: {},
    ...(options.defaultDeployFolder ? { lastBaseFolder: options.defaultDeployFolder } : {})
  };
  return { session, screen: { mode: "select-skill", cursor: 0 } };
}
