/**
 * Shape of the key objects node:readline emits with "keypress".
 */
export type KeyPress = {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

const NAMED_KEYS: Record<string, string> = {
  return: "enter",
  enter: "enter",
  escape: "esc",
  tab: "tab",
  up: "up",
  down: "down",
  left: "left",
  right: "right",
  home: "home",
  end: "end",
  backspace: "backspace",
  delete: "delete"
};

function isPrintable(sequence: string): boolean {
  if (sequence.length !== 1) return false;
  const code = sequence.charCodeAt(0);
  return code >= 32 && code !== 127;
}

/**
 * Normalize a key press to a single token: "enter", "esc", "shift+tab",
 * "ctrl+c", or the printable character itself.
 */
export function keyString(key: KeyPress): string {
  const name = key.name ?? "";
  if (key.ctrl && name) return `ctrl+${name}`;
  if (name === "tab" && key.shift) return "shift+tab";
  const named = NAMED_KEYS[name];
  if (named) return named;
  if (key.sequence && !key.meta && isPrintable(key.sequence)) return key.sequence;
  return name;
}

/** Printable character carried by the key, if any. */
export function printableChar(key: KeyPress): string | undefined {
  if (key.ctrl || key.meta || !key.sequence) return undefined;
  return isPrintable(key.sequence) ? key.sequence : undefined;
}
