import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { configureLogging, createLogger, findProjectRoot, loadConfig } from "../src/index.js";

async function mkTmpDir() {
  return fs.mkdtemp(path.join(os.tmpdir(), "skillforge-config-"));
}

describe("loadConfig", () => {
  it("uses defaults without a config file", async () => {
    const root = await mkTmpDir();
    const config = await loadConfig(root, {}, {});
    expect(config).toEqual({
      root,
      skillsDir: path.join(root, "skills"),
      stagingDir: path.join(root, "dist"),
      buildCommand: ["go", "build", "-o", "{output}", "{entry}"],
      helpTimeoutMs: 10000,
      logLevel: "info"
    });
  });

  it("reads skillforge.config.yaml", async () => {
    const root = await mkTmpDir();
    await fs.writeFile(
      path.join(root, "skillforge.config.yaml"),
      "skillsDir: src/skills\nbuildCommand: [make, build]\nhelpTimeoutMs: 500\ndefaultDeployFolder: /opt/skills\n"
    );
    const config = await loadConfig(root, {}, {});
    expect(config.skillsDir).toBe(path.join(root, "src", "skills"));
    expect(config.buildCommand).toEqual(["make", "build"]);
    expect(config.helpTimeoutMs).toBe(500);
    expect(config.defaultDeployFolder).toBe("/opt/skills");
  });

  it("lets the environment override the file and flags override both", async () => {
    const root = await mkTmpDir();
    await fs.writeFile(path.join(root, "skillforge.config.yaml"), "skillsDir: a\nlogLevel: warn\n");
    const env = { SKILLFORGE_SKILLS_DIR: "b", SKILLFORGE_LOG_LEVEL: "DEBUG" };

    const fromEnv = await loadConfig(root, {}, env);
    expect(fromEnv.skillsDir).toBe(path.join(root, "b"));
    expect(fromEnv.logLevel).toBe("debug");

    const fromFlags = await loadConfig(root, { skillsDir: "c", logLevel: undefined }, env);
    expect(fromFlags.skillsDir).toBe(path.join(root, "c"));
    expect(fromFlags.logLevel).toBe("debug");
  });

  it("reports invalid values with their path", async () => {
    const root = await mkTmpDir();
    await fs.writeFile(path.join(root, "skillforge.config.yaml"), "helpTimeoutMs: -1\n");
    await expect(loadConfig(root, {}, {})).rejects.toThrow(/^Invalid skillforge\.config\.yaml: helpTimeoutMs: /);
  });

  it("rejects a config file that is not a mapping", async () => {
    const root = await mkTmpDir();
    await fs.writeFile(path.join(root, "skillforge.config.yaml"), "- a\n- b\n");
    await expect(loadConfig(root, {}, {})).rejects.toThrow("skillforge.config.yaml must be a YAML object");
  });
});

describe("findProjectRoot", () => {
  it("walks up to the directory holding skills/", async () => {
    const root = await mkTmpDir();
    await fs.mkdir(path.join(root, "skills", "tasks", "cmd"), { recursive: true });
    expect(findProjectRoot(path.join(root, "skills", "tasks", "cmd"))).toBe(root);
  });
});

describe("logger", () => {
  afterEach(() => {
    configureLogging({ level: "info" });
  });

  it("appends scoped lines at or above the level to a file", async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, "logs", "wizard.log");
    configureLogging({ level: "info", file });

    const log = createLogger("wizard").child("build");
    log.debug("hidden");
    log.info("compiling");
    log.error("failed");

    const lines = (await fs.readFile(file, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\S+ INFO  \[wizard:build\] compiling$/);
    expect(lines[1]).toMatch(/^\S+ ERROR \[wizard:build\] failed$/);
  });

  it("writes nothing when silent", async () => {
    const dir = await mkTmpDir();
    const file = path.join(dir, "silent.log");
    configureLogging({ level: "silent", file });
    createLogger("x").error("nope");
    await expect(fs.access(file)).rejects.toThrow();
  });
});
