import { Chalk, type ChalkInstance } from "chalk";
import { DEPLOY_LABELS } from "./machine.js";
import { displayValue, type TextInput } from "./text-input.js";
import type {
  BuildingScreen,
  ConfigureDeployTargetScreen,
  ConfigureVariablesScreen,
  ConfirmScreen,
  DoneScreen,
  OverwriteWarningScreen,
  SelectSkillScreen,
  WizardMode,
  WizardSession,
  WizardState
} from "./state.js";

export type Theme = {
  title: (text: string) => string;
  label: (text: string) => string;
  normal: (text: string) => string;
  selected: (text: string) => string;
  muted: (text: string) => string;
  error: (text: string) => string;
  success: (text: string) => string;
  cursor: (text: string) => string;
  help: (text: string) => string;
};

export function createTheme(chalk: ChalkInstance = new Chalk()): Theme {
  return {
    title: chalk.bold.magenta,
    label: chalk.bold.cyan,
    normal: chalk.white,
    selected: chalk.bold.green,
    muted: chalk.gray,
    error: chalk.red,
    success: chalk.green,
    cursor: chalk.inverse,
    help: chalk.dim
  };
}

/** Theme without escape codes. */
export const plainTheme: Theme = createTheme(new Chalk({ level: 0 }));

const HELP: Record<WizardMode, string> = {
  "select-skill": "↑/↓: Navigate • Enter: Select • q: Quit",
  "configure-variables": "↑/↓/Tab: Navigate • Enter: Next Step • Esc: Back",
  "configure-deploy-target": "↑/↓/Tab: Navigate • Enter: Next Step • Esc: Back",
  confirm: "Y/Enter: Build & Deploy • N/Esc: Back",
  "overwrite-warning": "Y: Overwrite • N/Esc: Cancel",
  building: "Building...",
  done: "Enter/q: Quit • R: Configure another skill"
};

/**
 * Preview of a secret: the first 8 characters when longer than 8, otherwise
 * fully masked.
 */
export function previewSecret(value: string): string {
  if (value.length > 8) return `${value.slice(0, 8)}...`;
  return "*".repeat(value.length);
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

function renderInput(input: TextInput, focused: boolean, theme: Theme): string {
  if (input.value === "") {
    const placeholder = input.placeholder ? theme.muted(input.placeholder) : "";
    return focused ? theme.cursor(" ") + placeholder : placeholder;
  }
  const shown = displayValue(input);
  if (!focused) return theme.normal(shown);
  const before = shown.slice(0, input.cursor);
  const at = shown.slice(input.cursor, input.cursor + 1) || " ";
  const after = shown.slice(input.cursor + 1);
  return theme.normal(before) + theme.cursor(at) + theme.normal(after);
}

function renderField(label: string, input: TextInput, focused: boolean, theme: Theme, hint?: string): string {
  const prefix = focused ? "▸ " : "  ";
  const style = focused ? theme.label : theme.muted;
  let out = `${prefix}${style(label)}\n  > ${renderInput(input, focused, theme)}\n`;
  if (focused && hint) out += `  ${theme.muted(hint)}\n`;
  return `${out}\n`;
}

function renderSelectSkill(session: WizardSession, screen: SelectSkillScreen, theme: Theme): string {
  const { manifests, errors } = session.catalog;
  let out = `${theme.label("Available Skills")}\n\n`;

  if (manifests.length === 0 && errors.length === 0) {
    out += `${theme.muted("  No skills found in skills/ directory")}\n`;
    out += theme.muted("  Add a skill.yaml to register a skill");
    return out;
  }

  manifests.forEach((manifest, i) => {
    const active = i === screen.cursor;
    out += `${active ? "▸ " : "  "}${(active ? theme.selected : theme.normal)(manifest.name)}`;
    out += ` ${theme.muted(`v${manifest.version}`)}\n`;
    out += `    ${theme.muted(manifest.description)}\n`;
  });

  if (errors.length > 0) {
    out += `\n${theme.error("Skills with Errors")}\n\n`;
    errors.forEach((failed, i) => {
      const active = manifests.length + i === screen.cursor;
      out += `${active ? "▸ " : "  "}${(active ? theme.error : theme.muted)(failed.name)}\n`;
      out += `    ${theme.muted(failed.reason)}\n`;
    });
  }

  return out;
}

function renderConfigureVariables(screen: ConfigureVariablesScreen, theme: Theme): string {
  let out = `${theme.label(`Step 1: ${screen.manifest.name} Environment`)}\n\n`;

  if (screen.manifest.variables.length === 0) {
    out += `${theme.muted("  This skill has no variables. Press Enter to continue.")}\n\n`;
  }

  screen.manifest.variables.forEach((v, i) => {
    const input = screen.inputs[i];
    if (!input) return;
    const label = v.required ? `${v.label} *` : v.label;
    out += renderField(label, input, i === screen.focus, theme, v.description);
  });

  out += theme.muted("  * required");
  return out;
}

function renderConfigureDeployTarget(screen: ConfigureDeployTargetScreen, theme: Theme): string {
  let out = `${theme.label("Step 2: Deploy Settings")}\n\n`;
  screen.inputs.forEach((input, i) => {
    out += renderField(`${DEPLOY_LABELS[i === 0 ? 0 : 1]} *`, input, i === screen.focus, theme);
  });
  out += theme.muted("  * required");
  return out;
}

function renderConfirm(session: WizardSession, screen: ConfirmScreen, theme: Theme): string {
  const { manifest, target, deployPath } = screen;
  let out = `${theme.label("Step 3: Confirm")}\n\n`;

  out += `${theme.muted("  Skill:         ")}${theme.normal(manifest.name)}\n\n`;

  if (manifest.variables.length > 0) {
    out += `${theme.muted("  Environment:")}\n`;
    for (const v of manifest.variables) {
      const raw = session.values[v.name] ?? "";
      const value = v.type === "secret" ? previewSecret(raw) : raw;
      out += `${theme.muted(`    ${`${v.label}:`.padEnd(12)} `)}${theme.normal(value)}\n`;
    }
    out += "\n";
  }

  out += `${theme.muted("  Deploy:")}\n`;
  out += `${theme.muted("    Skills Folder: ")}${theme.normal(target.baseFolder)}\n`;
  out += `${theme.muted("    Skill Name:    ")}${theme.normal(target.folderName)}\n`;
  out += `${theme.muted("    Target:        ")}${theme.success(deployPath)}\n\n`;

  out += `${theme.normal("  Build and deploy this skill?")}\n`;
  out += theme.muted("  [Y] Yes  [N] Back");
  return out;
}

function renderOverwriteWarning(screen: OverwriteWarningScreen, theme: Theme): string {
  let out = `${theme.error("⚠  Skill already exists")}\n\n`;
  out += `${theme.muted('  The skill "')}${theme.normal(screen.manifest.name)}${theme.muted('" already exists at:')}\n`;
  out += `  ${theme.normal(screen.deployPath)}\n\n`;
  out += `${theme.normal("  Overwrite?")}\n`;
  out += theme.muted("  [Y] Yes, overwrite  [N] Cancel");
  return out;
}

function renderBuilding(screen: BuildingScreen, theme: Theme): string {
  const verb = screen.phase === "compiling" ? "Compiling" : "Deploying";
  return `${theme.label("Building...")}\n\n${theme.muted(`  ${verb} ${screen.manifest.name}...`)}`;
}

function renderDone(screen: DoneScreen, theme: Theme): string {
  const { outcome } = screen;
  if (outcome.ok) {
    let out = `${theme.success(`✓ ${outcome.message}`)}\n\n`;
    out += `${theme.muted("  Deployed to: ")}${theme.normal(screen.deployPath)}\n\n`;
    out += theme.muted("  The skill is now ready to use!");
    return out;
  }
  let out = `${theme.error("✗ Build/Deploy failed")}\n\n`;
  out += `  ${theme.error(outcome.error)}`;
  const output = outcome.output?.trimEnd();
  if (output) {
    out += `\n\n${theme.muted("  Output:")}\n${theme.muted(indent(output, "    "))}`;
  }
  return out;
}

function screenError(state: WizardState): string | undefined {
  const { screen } = state;
  switch (screen.mode) {
    case "select-skill":
    case "configure-variables":
    case "configure-deploy-target":
      return screen.error;
    default:
      return undefined;
  }
}

function renderBody(state: WizardState, theme: Theme): string {
  const { session, screen } = state;
  switch (screen.mode) {
    case "select-skill":
      return renderSelectSkill(session, screen, theme);
    case "configure-variables":
      return renderConfigureVariables(screen, theme);
    case "configure-deploy-target":
      return renderConfigureDeployTarget(screen, theme);
    case "confirm":
      return renderConfirm(session, screen, theme);
    case "overwrite-warning":
      return renderOverwriteWarning(screen, theme);
    case "building":
      return renderBuilding(screen, theme);
    case "done":
      return renderDone(screen, theme);
  }
}

/**
 * Render the whole wizard screen as text.
 */
export function renderWizard(state: WizardState, theme: Theme = createTheme()): string {
  let out = `${theme.title("Skillforge")}  ${theme.muted(state.session.version)}\n\n${renderBody(state, theme)}\n`;
  const error = screenError(state);
  if (error) {
    out += `\n${theme.error(`✗ ${error}`)}\n`;
  }
  out += `\n${theme.help(HELP[state.screen.mode])}\n`;
  return out;
}
