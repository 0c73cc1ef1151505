import { describe, it, expect } from "vitest";
import {
  normalizeManifest,
  renderCommandDocs,
  renderEnvFile,
  renderJsonTable,
  renderSkillDocs,
  renderWrapperScript,
  stripFrontmatter,
  type CommandNode
} from "../src/index.js";

const manifest = normalizeManifest(
  {
    name: "tasks",
    description: "Manage tasks",
    variables: [
      { name: "API_TOKEN", label: "API Token", type: "secret", required: true },
      { name: "PROJECTS", label: "Projects", type: "json" },
      { name: "REGION" }
    ]
  },
  "/src/tasks",
  "/src/tasks/skill.yaml"
);

const commands: CommandNode[] = [
  {
    name: "tasks",
    path: ["tasks"],
    description: "Work with tasks",
    flags: [],
    children: [
      {
        name: "create",
        path: ["tasks", "create"],
        description: "Create a task",
        usage: "tasks create [flags]",
        flags: [{ names: ["-t", "--title"], type: "string", description: "Task title (required)", required: true }],
        children: []
      }
    ]
  },
  { name: "version", path: ["version"], flags: [], children: [] }
];

describe("stripFrontmatter", () => {
  it("removes the leading header", () => {
    expect(stripFrontmatter("---\nname: old\n---\n# Body\n\ntext\n")).toBe("# Body\n\ntext\n");
  });

  it("drops blank lines between the header and the content", () => {
    expect(stripFrontmatter("---\nname: old\n---\n\n\n# Body\n")).toBe("# Body\n");
  });

  it("returns content without a header verbatim", () => {
    const text = "# Title\n\n---\nnot a header\n---\n";
    expect(stripFrontmatter(text)).toBe(text);
  });

  it("returns an unterminated header verbatim", () => {
    expect(stripFrontmatter("---\nname: x\n# Body\n")).toBe("---\nname: x\n# Body\n");
  });
});

describe("renderJsonTable", () => {
  it("renders name and id pairs", () => {
    expect(renderJsonTable('{"Inbox":"p1","Work":42}')).toBe(
      "| ID | Name |\n|----|------|\n| p1 | Inbox |\n| 42 | Work |"
    );
  });

  it("shows values that are not objects raw", () => {
    expect(renderJsonTable("[1,2]")).toBe("Config: `[1,2]`");
    expect(renderJsonTable("not json")).toBe("Config: `not json`");
  });
});

describe("renderCommandDocs", () => {
  it("documents leaves only", () => {
    expect(renderCommandDocs(commands, "/deploy/bin/tasks")).toBe(
      [
        "### tasks create",
        "",
        "Create a task",
        "",
        "**Usage:** `/deploy/bin/tasks tasks create [flags]`",
        "",
        "**Flags:**",
        "- `-t, --title` (string): Task title (required)",
        "",
        "### version",
        "",
        ""
      ].join("\n")
    );
  });

  it("points at --help when nothing was discovered", () => {
    expect(renderCommandDocs([], "/deploy/bin/tasks")).toBe("Run `/deploy/bin/tasks --help` to see available commands.");
  });
});

describe("renderSkillDocs", () => {
  const template = [
    "---",
    "name: stale",
    "---",
    "",
    "Binary: {{SKILL_PATH}}/bin/tasks",
    "",
    "{{PROJECTS_TABLE}}",
    "",
    "{{COMMANDS}}",
    "{{UNKNOWN}}",
    ""
  ].join("\n");

  it("replaces placeholders and writes a fresh header", () => {
    const out = renderSkillDocs({
      deployPath: "/deploy",
      manifest,
      values: { API_TOKEN: "test-secret", PROJECTS: '{"Inbox":"p1"}' },
      commands: [],
      template
    });
    expect(out).toBe(
      [
        "---",
        "name: tasks",
        "description: Manage tasks",
        "---",
        "",
        "Binary: /deploy/bin/tasks",
        "",
        "| ID | Name |",
        "|----|------|",
        "| p1 | Inbox |",
        "",
        "Run `/deploy/bin/tasks --help` to see available commands.",
        "{{UNKNOWN}}",
        ""
      ].join("\n")
    );
  });

  it("notes unconfigured json variables", () => {
    const out = renderSkillDocs({ deployPath: "/deploy", manifest, values: {}, commands: [], template });
    expect(out).toContain("\nNo Projects configured.\n");
  });

  it("falls back to a skeleton without a template", () => {
    const out = renderSkillDocs({ deployPath: "/deploy", manifest, values: {}, commands: [] });
    expect(out).toBe(
      "---\nname: tasks\ndescription: Manage tasks\n---\n\n# tasks\n\nManage tasks\n\n## Commands\n\nRun `/deploy/bin/tasks --help` to see available commands.\n"
    );
  });

  it("is idempotent", () => {
    const input = {
      deployPath: "/deploy",
      manifest,
      values: { PROJECTS: '{"Inbox":"p1"}' },
      commands,
      template
    };
    expect(renderSkillDocs(input)).toBe(renderSkillDocs(input));
  });
});

describe("renderEnvFile", () => {
  it("writes non-empty values in manifest order", () => {
    expect(renderEnvFile(manifest, { REGION: "eu", API_TOKEN: "test-secret", PROJECTS: "" })).toBe(
      "# Auto-generated environment file\nAPI_TOKEN=test-secret\nREGION=eu\n"
    );
  });

  it("keeps quotes and spaces verbatim", () => {
    expect(renderEnvFile(manifest, { PROJECTS: '{"Inbox": "p1"}' })).toBe(
      '# Auto-generated environment file\nPROJECTS={"Inbox": "p1"}\n'
    );
  });

  it("refuses values with line breaks", () => {
    expect(() => renderEnvFile(manifest, { REGION: "eu\nAPI_TOKEN=other" })).toThrow(
      "value of REGION must not contain line breaks"
    );
  });
});

describe("renderWrapperScript", () => {
  it("execs the deployed binary", () => {
    expect(renderWrapperScript(manifest)).toContain('exec "$DIR/bin/tasks" "$@"\n');
  });

  it("reads .env line by line instead of sourcing it", () => {
    const script = renderWrapperScript(manifest);
    expect(script).toContain('done < "$DIR/bin/.env"\n');
    expect(script).toContain('*=*) export "${line%%=*}=${line#*=}" ;;\n');
    expect(script).not.toContain('. "$DIR/bin/.env"');
  });
});
