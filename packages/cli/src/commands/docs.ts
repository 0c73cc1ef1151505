import path from "node:path";
import { renderCommandDocs, type ResolvedConfig } from "@skillforge/core";
import { introspectBinary } from "@skillforge/runner";

export type DocsCommandOptions = {
  /** Binary path shown in usage lines; defaults to the binary argument. */
  as?: string;
};

/**
 * Introspect a built binary and render the command reference for it.
 */
export async function docsCommand(
  config: ResolvedConfig,
  binary: string,
  opts: DocsCommandOptions = {}
): Promise<string> {
  const binaryPath = path.resolve(process.cwd(), binary);
  const commands = await introspectBinary(binaryPath, { timeoutMs: config.helpTimeoutMs });
  return renderCommandDocs(commands, opts.as ?? binaryPath);
}
