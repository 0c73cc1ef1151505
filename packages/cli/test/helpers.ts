import path from "node:path";
import { normalizeManifest, type SkillCatalog, type SkillManifest } from "@skillforge/core";
import type { KeyPress } from "../src/wizard/keys.js";
import { update } from "../src/wizard/machine.js";
import { createInitialState, type WizardEffect, type WizardEnv, type WizardEvent, type WizardState } from "../src/wizard/state.js";

export const tasksManifest: SkillManifest = normalizeManifest(
  {
    name: "tasks",
    description: "Manage tasks",
    version: "1.0.0",
    variables: [
      { name: "API_TOKEN", label: "API Token", type: "secret", required: true, description: "Personal access token" },
      { name: "REGION", label: "Region", placeholder: "eu" }
    ],
    build: { binary: "tasks-cli" }
  },
  "/src/skills/tasks",
  "/src/skills/tasks/skill.yaml"
);

export const habitsManifest: SkillManifest = normalizeManifest(
  { name: "habits", description: "Track habits", version: "0.2.0" },
  "/src/skills/habits",
  "/src/skills/habits/skill.yaml"
);

export const catalog: SkillCatalog = {
  manifests: [tasksManifest, habitsManifest],
  errors: [{ name: "broken", dir: "/src/skills/broken", reason: "description must be a non-empty string" }]
};

export function initialState(): WizardState {
  return createInitialState({ version: "0.1.0", catalog });
}

export function envWith(existing: string[] = []): WizardEnv {
  const files = new Set(existing.map((p) => path.resolve(p)));
  return { artifactExists: (p) => files.has(path.resolve(p)) };
}

const NAMED: Record<string, KeyPress> = {
  enter: { name: "return", sequence: "\r" },
  esc: { name: "escape", sequence: "\x1b" },
  tab: { name: "tab", sequence: "\t" },
  "shift+tab": { name: "tab", sequence: "\x1b[Z", shift: true },
  up: { name: "up", sequence: "\x1b[A" },
  down: { name: "down", sequence: "\x1b[B" },
  backspace: { name: "backspace", sequence: "\x7f" },
  "ctrl+c": { name: "c", sequence: "\x03", ctrl: true }
};

/** Key event for a named key ("enter", "esc", ...) or a single character. */
export function key(k: string): WizardEvent {
  const named = NAMED[k];
  if (named) return { type: "key", key: named };
  return { type: "key", key: { name: k.toLowerCase(), sequence: k, shift: k !== k.toLowerCase() } };
}

export function typed(text: string): WizardEvent[] {
  return [...text].map((ch) => key(ch));
}

/** Apply events in order, collecting every effect produced. */
export function run(
  state: WizardState,
  events: WizardEvent[],
  env: WizardEnv = envWith()
): { state: WizardState; effects: WizardEffect[] } {
  const effects: WizardEffect[] = [];
  let current = state;
  for (const event of events) {
    const t = update(current, event, env);
    current = t.state;
    effects.push(...t.effects);
  }
  return { state: current, effects };
}
