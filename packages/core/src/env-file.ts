import type { ConfigValues, SkillManifest } from "./types.js";

export const ENV_FILE_HEADER = "# Auto-generated environment file";

export function hasLineBreak(value: string): boolean {
  return /[\r\n]/.test(value);
}

/**
 * KEY=VALUE lines for every manifest variable with a non-empty value, in
 * manifest order. Values are written raw, one per line.
 */
export function renderEnvFile(manifest: SkillManifest, values: ConfigValues): string {
  const lines = [ENV_FILE_HEADER];
  for (const v of manifest.variables) {
    const value = values[v.name];
    if (value !== undefined && value !== "") {
      if (hasLineBreak(value)) {
        throw new Error(`value of ${v.name} must not contain line breaks`);
      }
      lines.push(`${v.name}=${value}`);
    }
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Shell wrapper that exports bin/.env and execs the deployed binary.
 * The file is read line by line and never sourced, so values reach the
 * binary verbatim.
 */
export function renderWrapperScript(manifest: SkillManifest): string {
  return `#!/bin/sh
# Auto-generated wrapper for ${manifest.name}
DIR="$(cd "$(dirname "$0")" && pwd)"
if [ -f "$DIR/bin/.env" ]; then
  while IFS= read -r line || [ -n "$line" ]; do
    case "$line" in
      ''|'#'*) continue ;;
      *=*) export "\${line%%=*}=\${line#*=}" ;;
    esac
  done < "$DIR/bin/.env"
fi
exec "$DIR/bin/${manifest.build.binary}" "$@"
`;
}
