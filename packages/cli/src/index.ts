#!/usr/bin/env tsx
import path from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { initSkill } from "./commands/init.js";
import { lintCommand } from "./commands/lint.js";
import { listCommand } from "./commands/list.js";
import { buildCommand } from "./commands/build.js";
import { deployCommand } from "./commands/deploy.js";
import { docsCommand } from "./commands/docs.js";
import { wizardCommand, WIZARD_LOG_FILE } from "./commands/wizard.js";
import { resolveContext, VERSION, type GlobalOptions } from "./context.js";

function fail(err: unknown): never {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("skillforge")
  .description("Build, configure and deploy CLI skills")
  .version(VERSION)
  .option("--root <dir>", "project root (default: nearest directory with skillforge.config.yaml or skills/)")
  .option("--log-level <level>", "debug | info | warn | error | silent");

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

program
  .command("wizard", { isDefault: true })
  .description("interactively configure, build and deploy a skill")
  .action(async () => {
    try {
      const config = await resolveContext(globals(), (root) => path.join(root, WIZARD_LOG_FILE));
      await wizardCommand(config, VERSION);
      // A build started before quitting would otherwise keep the process alive.
      process.exit(0);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("list")
  .description("list discovered skills")
  .action(async () => {
    try {
      const config = await resolveContext(globals());
      const catalog = await listCommand(config);
      if (catalog.manifests.length === 0 && catalog.errors.length === 0) {
        console.log(chalk.yellow(`No skills found in ${config.skillsDir}`));
        return;
      }
      for (const m of catalog.manifests) {
        console.log(`${chalk.green(m.name)} ${chalk.gray(`v${m.version}`)}  ${m.description}`);
      }
      for (const e of catalog.errors) {
        console.log(`${chalk.red(e.name)}  ${chalk.gray(e.reason)}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("lint")
  .argument("<dir>", "skill directory")
  .description("validate a skill manifest")
  .action(async (dir: string) => {
    const res = await lintCommand(dir);
    if (res.ok) {
      console.log(chalk.green("Lint OK"));
    } else {
      console.error(chalk.red("Lint failed"));
    }
    for (const issue of res.issues) {
      const color = issue.severity === "error" ? chalk.red : chalk.yellow;
      console.log(color(`${issue.severity.toUpperCase()} ${issue.code}: ${issue.message}${issue.path ? ` (${issue.path})` : ""}`));
    }
    process.exit(res.ok ? 0 : 1);
  });

program
  .command("build")
  .argument("<skill>", "skill name")
  .description("compile a skill into the staging directory")
  .action(async (skill: string) => {
    try {
      const config = await resolveContext(globals());
      const result = await buildCommand(config, skill);
      if (result.output) console.log(chalk.gray(result.output.trimEnd()));
      if (!result.ok) fail(result.error);
      console.log(chalk.green(`Built ${result.binaryPath}`));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("deploy")
  .argument("<skill>", "skill name")
  .requiredOption("--target <dir>", "skills folder to deploy into")
  .option("--name <name>", "folder name inside the skills folder (default: skill name)")
  .option("--env <pair>", "variable value as KEY=VALUE (repeatable)", collect, [])
  .option("--from-env", "read variable values from the process environment", false)
  .option("--force", "overwrite an existing deployment", false)
  .description("build and deploy a skill without the wizard")
  .action(
    async (
      skill: string,
      opts: { target: string; name?: string; env: string[]; fromEnv: boolean; force: boolean }
    ) => {
      try {
        const config = await resolveContext(globals());
        const result = await deployCommand(config, skill, opts);
        if (!result.ok) {
          console.error(chalk.red(`✗ ${result.stage === "build" ? "Build" : "Deploy"} failed: ${result.error}`));
          if (result.output) console.error(chalk.gray(result.output.trimEnd()));
          process.exit(1);
        }
        console.log(chalk.green(`✓ Skill deployed successfully to ${result.deployPath}`));
        for (const file of result.written) {
          console.log(chalk.gray(`  ${file}`));
        }
      } catch (err) {
        fail(err);
      }
    }
  );

program
  .command("docs")
  .argument("<binary>", "built skill binary")
  .option("--as <path>", "binary path to show in usage lines")
  .description("print command docs generated from a binary's --help output")
  .action(async (binary: string, opts: { as?: string }) => {
    try {
      const config = await resolveContext(globals());
      console.log(await docsCommand(config, binary, opts));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("init")
  .argument("<dir>", "skill directory")
  .description("create a skill skeleton")
  .action(async (dir: string) => {
    try {
      const root = await initSkill(dir);
      console.log(chalk.green(`Initialized skill at ${root}`));
    } catch (err) {
      fail(err);
    }
  });

void program.parseAsync(process.argv);
