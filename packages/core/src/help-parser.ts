import type { FlagDescriptor } from "./types.js";

/**
 * Parsers for conventional (cobra-style) help output:
 *
 *   Short description
 *
 *   Usage:
 *     prog tasks create [flags]
 *
 *   Available Commands:
 *     list        List tasks
 *
 *   Flags:
 *     -t, --title string   Task title (required)
 *
 * Help text is a convention, not a contract. Every parser here degrades to an
 * empty result instead of throwing.
 */

const RESERVED_COMMANDS = new Set(["help", "completion"]);

export const FLAG_TYPES: ReadonlySet<string> = new Set([
  "string",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "bool",
  "float",
  "float32",
  "float64",
  "duration",
  "strings",
  "ints",
  "uints",
  "bools",
  "durations",
  "stringArray",
  "stringSlice",
  "intSlice",
  "int32Slice",
  "int64Slice",
  "uintSlice",
  "float32Slice",
  "float64Slice",
  "boolSlice",
  "durationSlice",
  "stringToString"
]);

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function fields(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

/**
 * Names listed under "Available Commands:", excluding help and completion.
 */
export function parseSubcommands(helpText: string): string[] {
  const commands: string[] = [];
  let inSection = false;

  for (const line of splitLines(helpText)) {
    const trimmed = line.trim();

    if (trimmed.startsWith("Available Commands:")) {
      inSection = true;
      continue;
    }
    if (!inSection) continue;

    if (trimmed === "") continue;
    if (trimmed.endsWith(":")) break;

    const name = fields(trimmed)[0];
    if (name && !RESERVED_COMMANDS.has(name)) {
      commands.push(name);
    }
  }

  return commands;
}

/**
 * First non-blank line before the "Usage:" header.
 */
export function parseDescription(helpText: string): string | undefined {
  for (const line of splitLines(helpText)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("Usage:")) break;
    if (trimmed !== "") return trimmed;
  }
  return undefined;
}

/**
 * The line after "Usage:" with the program token dropped.
 */
export function parseUsage(helpText: string): string | undefined {
  const lines = splitLines(helpText);
  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].trim().startsWith("Usage:")) continue;
    const next = lines[i + 1];
    if (next === undefined) continue;
    const parts = fields(next);
    if (parts.length > 1) {
      return parts.slice(1).join(" ");
    }
  }
  return undefined;
}

/**
 * Parse one flag line such as `-t, --title string   Task title (required)`.
 * Returns undefined for lines that do not start with a dash.
 */
export function parseFlagLine(line: string): FlagDescriptor | undefined {
  const parts = fields(line);
  if (parts.length === 0 || !parts[0].startsWith("-")) return undefined;

  const names: string[] = [];
  let i = 0;
  while (i < parts.length && (parts[i].startsWith("-") || parts[i] === ",")) {
    if (parts[i] !== ",") {
      const name = parts[i].replace(/,$/, "");
      if (name) names.push(name);
    }
    i++;
  }

  let type: string | undefined;
  if (i < parts.length && FLAG_TYPES.has(parts[i])) {
    type = parts[i];
    i++;
  }

  const description = parts.slice(i).join(" ");
  const flag: FlagDescriptor = {
    names,
    description,
    required: /\(required\)/i.test(description)
  };
  if (type) flag.type = type;
  return flag;
}

/**
 * Flags listed under "Flags:". The universal --help flag is dropped.
 */
export function parseFlags(helpText: string): FlagDescriptor[] {
  const flags: FlagDescriptor[] = [];
  let inSection = false;

  for (const line of splitLines(helpText)) {
    const trimmed = line.trim();

    if (trimmed.startsWith("Flags:")) {
      inSection = true;
      continue;
    }
    if (!inSection) continue;

    if (trimmed === "") continue;
    if (trimmed.endsWith(":")) break;

    const flag = parseFlagLine(trimmed);
    if (flag && !flag.names.includes("--help")) {
      flags.push(flag);
    }
  }

  return flags;
}

export function formatFlagNames(flag: FlagDescriptor): string {
  return flag.names.join(", ");
}
