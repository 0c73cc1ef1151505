import {
  deployedBinaryPath,
  firstMissingRequired,
  resolveDeployPath,
  type ConfigValues,
  type DeployTarget,
  type SkillManifest
} from "@skillforge/core";
import { keyString, type KeyPress } from "./keys.js";
import { applyTextKey, createTextInput, type TextInput } from "./text-input.js";
import type {
  BuildingScreen,
  ConfigureDeployTargetScreen,
  ConfigureVariablesScreen,
  ConfirmScreen,
  DoneScreen,
  OverwriteWarningScreen,
  SelectSkillScreen,
  Transition,
  WizardEffect,
  WizardEnv,
  WizardEvent,
  WizardSession,
  WizardState
} from "./state.js";

export const DEPLOY_SUCCESS_MESSAGE = "Skill deployed successfully!";
export const DEPLOY_LABELS = ["Skills Folder", "Skill Name"] as const;

function unchanged(state: WizardState): Transition {
  return { state, effects: [] };
}

function to(session: WizardSession, screen: WizardState["screen"], effects: WizardEffect[] = []): Transition {
  return { state: { session, screen }, effects };
}

function quit(state: WizardState): Transition {
  return { state, effects: [{ type: "quit" }] };
}

function cycle(focus: number, length: number, step: 1 | -1): number {
  return (focus + step + length) % length;
}

export function seedVariableInputs(manifest: SkillManifest, values: ConfigValues): TextInput[] {
  return manifest.variables.map((v) =>
    createTextInput({
      value: values[v.name] ?? "",
      placeholder: v.placeholder || v.default || "",
      secret: v.type === "secret",
      charLimit: v.type === "json" ? 2000 : 200
    })
  );
}

export function seedTargetInputs(manifest: SkillManifest, session: WizardSession): [TextInput, TextInput] {
  const saved = session.targets[manifest.name];
  return [
    createTextInput({
      value: saved?.baseFolder ?? session.lastBaseFolder ?? "",
      placeholder: "/path/to/.claude/skills/"
    }),
    createTextInput({
      value: saved?.folderName || manifest.name,
      placeholder: manifest.name,
      charLimit: 100
    })
  ];
}

function saveValues(session: WizardSession, manifest: SkillManifest, inputs: readonly TextInput[]): WizardSession {
  const values: Record<string, string> = { ...session.values };
  manifest.variables.forEach((v, i) => {
    values[v.name] = inputs[i]?.value ?? "";
  });
  return { ...session, values };
}

function saveTarget(session: WizardSession, manifest: SkillManifest, target: DeployTarget): WizardSession {
  return {
    ...session,
    targets: { ...session.targets, [manifest.name]: target },
    lastBaseFolder: target.baseFolder || session.lastBaseFolder
  };
}

function targetFromInputs(inputs: readonly [TextInput, TextInput]): DeployTarget {
  return { baseFolder: inputs[0].value.trim(), folderName: inputs[1].value.trim() };
}

/** Values of the manifest's own variables, copied for a background task. */
function captureValues(manifest: SkillManifest, values: ConfigValues): ConfigValues {
  const captured: Record<string, string> = {};
  for (const v of manifest.variables) {
    const value = values[v.name];
    if (value !== undefined) captured[v.name] = value;
  }
  return captured;
}

function variablesScreen(manifest: SkillManifest, session: WizardSession): ConfigureVariablesScreen {
  return {
    mode: "configure-variables",
    manifest,
    inputs: seedVariableInputs(manifest, session.values),
    focus: 0
  };
}

function targetScreen(manifest: SkillManifest, session: WizardSession): ConfigureDeployTargetScreen {
  return {
    mode: "configure-deploy-target",
    manifest,
    inputs: seedTargetInputs(manifest, session),
    focus: 0
  };
}

function buildingScreen(screen: ConfirmScreen | OverwriteWarningScreen): BuildingScreen {
  return { mode: "building", manifest: screen.manifest, deployPath: screen.deployPath, phase: "compiling" };
}

function onSelectSkill(state: WizardState, screen: SelectSkillScreen, key: string): Transition {
  const { manifests, errors } = state.session.catalog;
  const total = manifests.length + errors.length;

  switch (key.toLowerCase()) {
    case "q":
    case "esc":
      return quit(state);
    case "up":
    case "k":
      if (screen.cursor === 0) return unchanged(state);
      return to(state.session, { mode: "select-skill", cursor: screen.cursor - 1 });
    case "down":
    case "j":
      if (screen.cursor >= total - 1) return unchanged(state);
      return to(state.session, { mode: "select-skill", cursor: screen.cursor + 1 });
    case "enter": {
      const manifest = manifests[screen.cursor];
      if (manifest) {
        return to(state.session, variablesScreen(manifest, state.session));
      }
      const failed = errors[screen.cursor - manifests.length];
      if (failed) {
        return to(state.session, { mode: "select-skill", cursor: screen.cursor, error: failed.reason });
      }
      return unchanged(state);
    }
    default:
      return unchanged(state);
  }
}

function onConfigureVariables(
  state: WizardState,
  screen: ConfigureVariablesScreen,
  key: KeyPress
): Transition {
  const { manifest, inputs, focus } = screen;
  const k = keyString(key);

  switch (k) {
    case "esc": {
      const session = saveValues(state.session, manifest, inputs);
      const cursor = Math.max(0, session.catalog.manifests.indexOf(manifest));
      return to(session, { mode: "select-skill", cursor });
    }
    case "tab":
    case "down":
      if (inputs.length === 0) return unchanged(state);
      return to(state.session, { ...screen, focus: cycle(focus, inputs.length, 1) });
    case "shift+tab":
    case "up":
      if (inputs.length === 0) return unchanged(state);
      return to(state.session, { ...screen, focus: cycle(focus, inputs.length, -1) });
    case "enter":
    case "ctrl+d": {
      const session = saveValues(state.session, manifest, inputs);
      const missing = firstMissingRequired(manifest, session.values);
      if (missing) {
        return to(state.session, { ...screen, error: `${missing.label} is required` });
      }
      return to(session, targetScreen(manifest, session));
    }
  }

  const current = inputs[focus];
  if (!current) return unchanged(state);
  const edited = applyTextKey(current, key);
  if (edited === undefined || edited === current) return unchanged(state);
  const nextInputs = inputs.map((input, i) => (i === focus ? edited : input));
  return to(state.session, { ...screen, inputs: nextInputs });
}

function onConfigureDeployTarget(
  state: WizardState,
  screen: ConfigureDeployTargetScreen,
  key: KeyPress
): Transition {
  const { manifest, inputs, focus } = screen;
  const k = keyString(key);

  switch (k) {
    case "esc": {
      const session = saveTarget(state.session, manifest, {
        baseFolder: inputs[0].value,
        folderName: inputs[1].value
      });
      return to(session, variablesScreen(manifest, session));
    }
    case "tab":
    case "down":
      return to(state.session, { ...screen, focus: cycle(focus, inputs.length, 1) });
    case "shift+tab":
    case "up":
      return to(state.session, { ...screen, focus: cycle(focus, inputs.length, -1) });
    case "enter":
    case "ctrl+d": {
      const target = targetFromInputs(inputs);
      if (!target.baseFolder) {
        return to(state.session, { ...screen, error: `${DEPLOY_LABELS[0]} is required` });
      }
      if (!target.folderName) {
        return to(state.session, { ...screen, error: `${DEPLOY_LABELS[1]} is required` });
      }
      const session = saveTarget(state.session, manifest, target);
      return to(session, { mode: "confirm", manifest, target, deployPath: resolveDeployPath(target) });
    }
  }

  const current = inputs[focus === 0 ? 0 : 1];
  const edited = applyTextKey(current, key);
  if (edited === undefined || edited === current) return unchanged(state);
  const nextInputs: [TextInput, TextInput] = focus === 0 ? [edited, inputs[1]] : [inputs[0], edited];
  return to(state.session, { ...screen, inputs: nextInputs });
}

function onConfirm(state: WizardState, screen: ConfirmScreen, key: string, env: WizardEnv): Transition {
  switch (key.toLowerCase()) {
    case "esc":
    case "n":
      return to(state.session, targetScreen(screen.manifest, state.session));
    case "enter":
    case "y": {
      if (env.artifactExists(deployedBinaryPath(screen.deployPath, screen.manifest))) {
        const warning: OverwriteWarningScreen = { ...screen, mode: "overwrite-warning" };
        return to(state.session, warning);
      }
      return to(state.session, buildingScreen(screen), [{ type: "build", manifest: screen.manifest }]);
    }
    default:
      return unchanged(state);
  }
}

function onOverwriteWarning(state: WizardState, screen: OverwriteWarningScreen, key: string): Transition {
  switch (key.toLowerCase()) {
    case "esc":
    case "n": {
      const confirm: ConfirmScreen = { ...screen, mode: "confirm" };
      return to(state.session, confirm);
    }
    case "y":
      return to(state.session, buildingScreen(screen), [{ type: "build", manifest: screen.manifest }]);
    default:
      return unchanged(state);
  }
}

function onDone(state: WizardState, key: string): Transition {
  switch (key.toLowerCase()) {
    case "enter":
    case "q":
    case "esc":
      return quit(state);
    case "r":
      return to(state.session, { mode: "select-skill", cursor: 0 });
    default:
      return unchanged(state);
  }
}

function onKey(state: WizardState, key: KeyPress, env: WizardEnv): Transition {
  const k = keyString(key);
  if (k === "ctrl+c") return quit(state);

  const { screen } = state;
  switch (screen.mode) {
    case "select-skill":
      return onSelectSkill(state, screen, k);
    case "configure-variables":
      return onConfigureVariables(state, screen, key);
    case "configure-deploy-target":
      return onConfigureDeployTarget(state, screen, key);
    case "confirm":
      return onConfirm(state, screen, k, env);
    case "overwrite-warning":
      return onOverwriteWarning(state, screen, k);
    case "building":
      return unchanged(state);
    case "done":
      return onDone(state, k);
  }
}

function onBuildComplete(state: WizardState, event: Extract<WizardEvent, { type: "build-complete" }>): Transition {
  const { screen } = state;
  if (screen.mode !== "building" || screen.phase !== "compiling") return unchanged(state);

  const { result } = event;
  if (!result.ok) {
    const done: DoneScreen = {
      mode: "done",
      manifest: screen.manifest,
      deployPath: screen.deployPath,
      outcome: { ok: false, error: result.error, output: result.output }
    };
    return to(state.session, done);
  }

  return to(state.session, { ...screen, phase: "deploying", buildOutput: result.output }, [
    {
      type: "deploy",
      manifest: screen.manifest,
      stagedBinary: result.binaryPath,
      deployPath: screen.deployPath,
      values: captureValues(screen.manifest, state.session.values)
    }
  ]);
}

function onDeployComplete(state: WizardState, event: Extract<WizardEvent, { type: "deploy-complete" }>): Transition {
  const { screen } = state;
  if (screen.mode !== "building" || screen.phase !== "deploying") return unchanged(state);

  const { result } = event;
  const done: DoneScreen = {
    mode: "done",
    manifest: screen.manifest,
    deployPath: screen.deployPath,
    outcome: result.ok ? { ok: true, message: DEPLOY_SUCCESS_MESSAGE } : { ok: false, error: result.error }
  };
  return to(state.session, done);
}

/**
 * Advance the wizard by one event. Events a mode does not handle return the
 * same state object and no effects.
 */
export function update(state: WizardState, event: WizardEvent, env: WizardEnv): Transition {
  switch (event.type) {
    case "key":
      return onKey(state, event.key, env);
    case "build-complete":
      return onBuildComplete(state, event);
    case "deploy-complete":
      return onDeployComplete(state, event);
  }
}
