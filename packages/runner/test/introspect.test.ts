import { describe, it, expect, beforeAll } from "vitest";
import { configureLogging, createLogger, type CommandNode } from "@skillforge/core";
import { buildSkill, createBuildJob, introspectBinary, introspectCommands, type HelpSource } from "../src/index.js";
import { mkTmpDir, testConfig, writeTasksSkill } from "./helpers.js";

const log = createLogger("test");

beforeAll(() => {
  configureLogging({ level: "silent" });
});

function fakeSource(pages: Record<string, string>): HelpSource & { calls: string[] } {
  const calls: string[] = [];
  const source = async (args: string[]) => {
    const key = args.join(" ");
    calls.push(key);
    const page = pages[key];
    if (page === undefined) throw new Error(`exit status 1`);
    return page;
  };
  return Object.assign(source, { calls });
}

const LEAF = `Create a task

Usage:
  prog sub [flags]

Flags:
  -t, --title string   Task title (required)
`;

describe("introspectCommands", () => {
  it("builds a leaf from usage and flags", async () => {
    const source = fakeSource({
      "": "Usage:\n  prog [command]\n\nAvailable Commands:\n  sub   Create a task\n",
      sub: LEAF
    });
    const tree = await introspectCommands(source, log);

    expect(tree).toEqual([
      {
        name: "sub",
        path: ["sub"],
        description: "Create a task",
        usage: "sub [flags]",
        flags: [{ names: ["-t", "--title"], type: "string", description: "Task title (required)", required: true }],
        children: []
      }
    ]);
  });

  it("stops two levels below the program", async () => {
    const source = fakeSource({
      "": "Available Commands:\n  a   group\n",
      a: "Group a\n\nAvailable Commands:\n  b   group\n",
      "a b": "Group b\n\nAvailable Commands:\n  c   leaf\n"
    });
    const tree = await introspectCommands(source, log);

    expect(source.calls).toEqual(["", "a", "a b"]);
    expect(tree.map((n) => n.path)).toEqual([["a"]]);
    expect(tree[0]?.children.map((n) => n.path)).toEqual([["a", "b"]]);
    expect(tree[0]?.children[0]?.children).toEqual([]);
  });

  it("leaves out commands whose help fails", async () => {
    const source = fakeSource({
      "": "Available Commands:\n  ok     fine\n  gone   fails\n  group  all children fail\n",
      ok: "Fine\n",
      group: "Group\n\nAvailable Commands:\n  x   fails\n"
    });
    const tree = await introspectCommands(source, log);
    expect(tree.map((n) => n.name)).toEqual(["ok"]);
  });

  it("returns nothing when the root help fails", async () => {
    expect(await introspectCommands(fakeSource({}), log)).toEqual([]);
  });
});

describe("introspectBinary", () => {
  it("runs a built binary with --help", async () => {
    const root = await mkTmpDir();
    const manifest = await writeTasksSkill(root);
    const built = await buildSkill(createBuildJob(manifest, testConfig(root)), log);
    if (!built.ok) throw new Error(built.error);

    const tree = await introspectBinary(built.binaryPath, { timeoutMs: 5000, log });

    const create: CommandNode = {
      name: "create",
      path: ["tasks", "create"],
      description: "Create a task",
      usage: "tasks create [flags]",
      flags: [
        { names: ["-t", "--title"], type: "string", description: "Task title (required)", required: true },
        { names: ["-p", "--priority"], type: "int", description: "Priority from 1 to 4", required: false }
      ],
      children: []
    };
    const list: CommandNode = {
      name: "list",
      path: ["tasks", "list"],
      description: "List tasks",
      usage: "tasks list [flags]",
      flags: [{ names: ["--done"], description: "Include completed tasks", required: false }],
      children: []
    };
    expect(tree).toEqual([
      { name: "tasks", path: ["tasks"], description: "Work with tasks", flags: [], children: [create, list] },
      { name: "version", path: ["version"], description: "Print the version", usage: "version", flags: [], children: [] }
    ]);
  });
});
