import { keyString, printableChar, type KeyPress } from "./keys.js";

export type TextInput = {
  readonly value: string;
  readonly cursor: number;
  readonly placeholder: string;
  readonly secret: boolean;
  readonly charLimit: number;
};

export function createTextInput(options: Partial<Pick<TextInput, "value" | "placeholder" | "secret" | "charLimit">> = {}): TextInput {
  const charLimit = options.charLimit ?? 200;
  const value = (options.value ?? "").slice(0, charLimit);
  return {
    value,
    cursor: value.length,
    placeholder: options.placeholder ?? "",
    secret: options.secret ?? false,
    charLimit
  };
}

/**
 * Apply an editing key. Returns undefined when the key does not edit text.
 */
export function applyTextKey(input: TextInput, key: KeyPress): TextInput | undefined {
  const { value, cursor } = input;
  switch (keyString(key)) {
    case "left":
      return cursor > 0 ? { ...input, cursor: cursor - 1 } : input;
    case "right":
      return cursor < value.length ? { ...input, cursor: cursor + 1 } : input;
    case "home":
    case "ctrl+a":
      return { ...input, cursor: 0 };
    case "end":
    case "ctrl+e":
      return { ...input, cursor: value.length };
    case "backspace":
      if (cursor === 0) return input;
      return { ...input, value: value.slice(0, cursor - 1) + value.slice(cursor), cursor: cursor - 1 };
    case "delete":
      if (cursor >= value.length) return input;
      return { ...input, value: value.slice(0, cursor) + value.slice(cursor + 1) };
    case "ctrl+u":
      return { ...input, value: value.slice(cursor), cursor: 0 };
    case "ctrl+k":
      return { ...input, value: value.slice(0, cursor) };
  }

  const ch = printableChar(key);
  if (ch === undefined) return undefined;
  if (value.length >= input.charLimit) return input;
  return { ...input, value: value.slice(0, cursor) + ch + value.slice(cursor), cursor: cursor + 1 };
}

/** Text shown for the value: asterisks for secrets. */
export function displayValue(input: TextInput): string {
  return input.secret ? "*".repeat(input.value.length) : input.value;
}
