import {
  createLogger,
  parseDescription,
  parseFlags,
  parseSubcommands,
  parseUsage,
  type CommandNode,
  type Logger
} from "@skillforge/core";
import { runProcess } from "./process.js";
import type { HelpSource } from "./types.js";

export type IntrospectOptions = {
  timeoutMs?: number;
  log?: Logger;
};

/**
 * Help source backed by executing `binaryPath <args...> --help`.
 */
export function binaryHelpSource(binaryPath: string, options: IntrospectOptions = {}): HelpSource {
  return async (args) => {
    const result = await runProcess(binaryPath, [...args, "--help"], { timeout: options.timeoutMs ?? 10_000 });
    if (result.error) {
      throw new Error(`${[binaryPath, ...args, "--help"].join(" ")}: ${result.error}`);
    }
    return result.output;
  };
}

function leafNode(path: string[], helpText: string): CommandNode {
  const node: CommandNode = {
    name: path[path.length - 1] ?? "",
    path,
    flags: parseFlags(helpText),
    children: []
  };
  const description = parseDescription(helpText);
  if (description) node.description = description;
  const usage = parseUsage(helpText);
  if (usage) node.usage = usage;
  return node;
}

/**
 * Rebuild the command tree two levels deep from help output alone. A command
 * whose help cannot be read is left out together with its subtree.
 */
export async function introspectCommands(
  source: HelpSource,
  log: Logger = createLogger("introspect")
): Promise<CommandNode[]> {
  const help = async (args: string[]): Promise<string | undefined> => {
    try {
      return await source(args);
    } catch (err) {
      log.debug(`skipping ${args.join(" ") || "(root)"}: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  };

  const rootHelp = await help([]);
  if (rootHelp === undefined) return [];

  const nodes: CommandNode[] = [];
  for (const name of parseSubcommands(rootHelp)) {
    const cmdHelp = await help([name]);
    if (cmdHelp === undefined) continue;

    const subcommands = parseSubcommands(cmdHelp);
    if (subcommands.length === 0) {
      nodes.push(leafNode([name], cmdHelp));
      continue;
    }

    const children: CommandNode[] = [];
    for (const sub of subcommands) {
      const subHelp = await help([name, sub]);
      if (subHelp === undefined) continue;
      children.push(leafNode([name, sub], subHelp));
    }
    if (children.length === 0) continue;

    const group: CommandNode = { name, path: [name], flags: [], children };
    const description = parseDescription(cmdHelp);
    if (description) group.description = description;
    nodes.push(group);
  }

  log.debug(`introspected ${nodes.length} top-level command(s)`);
  return nodes;
}

export function introspectBinary(binaryPath: string, options: IntrospectOptions = {}): Promise<CommandNode[]> {
  return introspectCommands(binaryHelpSource(binaryPath, options), options.log);
}
