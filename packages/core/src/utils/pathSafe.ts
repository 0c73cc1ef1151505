import path from "node:path";

/**
 * Resolve `relativePath` under `rootDir`, refusing absolute paths and any
 * path that would leave the root. `label` names the root in error messages.
 */
export function safeResolve(rootDir: string, relativePath: string, label = "skill root"): string {
  if (path.isAbsolute(relativePath)) {
    throw new Error(`Absolute paths are not allowed: ${relativePath}`);
  }
  const segments = relativePath.replace(/\\/g, "/").split("/").filter(Boolean);
  if (segments.includes("..")) {
    throw new Error(`Path traversal not allowed: ${relativePath}`);
  }
  const resolved = path.resolve(rootDir, relativePath);
  const rootResolved = path.resolve(rootDir);
  if (resolved !== rootResolved && !resolved.startsWith(rootResolved + path.sep)) {
    throw new Error(`Path escapes ${label}: ${relativePath}`);
  }
  return resolved;
}
