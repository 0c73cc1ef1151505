import fs from "node:fs/promises";
import path from "node:path";
import {
  createLogger,
  deployBinDir,
  deployedBinaryPath,
  docsPath,
  envFilePath,
  renderEnvFile,
  renderSkillDocs,
  renderWrapperScript,
  safeResolve,
  stagedBinaryPath,
  wrapperPath,
  type CommandNode,
  type ConfigValues,
  type Logger,
  type ResolvedConfig,
  type SkillManifest
} from "@skillforge/core";
import { binaryHelpSource, introspectCommands } from "./introspect.js";
import type { DeployJob, DeployResult, HelpSource } from "./types.js";

export type DeployOptions = {
  /** Replaces executing the staged binary for command discovery. */
  helpSource?: HelpSource;
  log?: Logger;
};

export function createDeployJob(
  manifest: SkillManifest,
  config: ResolvedConfig,
  deployPath: string,
  values: ConfigValues
): DeployJob {
  return {
    manifest,
    stagedBinary: stagedBinaryPath(config.stagingDir, manifest),
    stagingDir: config.stagingDir,
    deployPath,
    values: { ...values },
    helpTimeoutMs: config.helpTimeoutMs
  };
}

class DeployStepError extends Error {
  constructor(step: string, cause: unknown) {
    super(`failed to ${step}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "DeployStepError";
  }
}

async function step<T>(name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new DeployStepError(name, err);
  }
}

async function readTemplate(manifest: SkillManifest): Promise<string | undefined> {
  const templatePath = safeResolve(manifest.dir, manifest.docs.template);
  try {
    return await fs.readFile(templatePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
}

/**
 * Install a staged build into `job.deployPath`:
 *
 *   bin/<binary>       executable, replaced by remove-then-write
 *   bin/.env           configured values, owner read/write only
 *   <copied files>     manifest deploy.files
 *   <binary>.sh        optional wrapper
 *   <docs.output>      documentation rendered from the binary's help
 *
 * The first failing step aborts the rest. Completed steps are not undone.
 */
export async function deploySkill(job: DeployJob, options: DeployOptions = {}): Promise<DeployResult> {
  const log = options.log ?? createLogger("deploy");
  const { manifest, deployPath } = job;
  const written: string[] = [];

  try {
    const binDir = deployBinDir(deployPath);
    await step("create bin directory", () => fs.mkdir(binDir, { recursive: true }));

    const binary = await step("read binary", () => fs.readFile(job.stagedBinary));
    const dstBinary = deployedBinaryPath(deployPath, manifest);
    // The old binary may still be mapped by a running process; unlink it
    // instead of truncating in place.
    await step("remove old binary", () => fs.rm(dstBinary, { force: true }));
    await step("write binary", () => fs.writeFile(dstBinary, binary, { mode: 0o755 }));
    written.push(dstBinary);

    const envPath = envFilePath(deployPath);
    await step("write .env", async () => {
      const text = renderEnvFile(manifest, job.values);
      await fs.rm(envPath, { force: true });
      await fs.writeFile(envPath, text, { mode: 0o600 });
    });
    written.push(envPath);

    for (const rule of manifest.deploy.files) {
      const dst = await step(`copy ${rule.from}`, async () => {
        const src = safeResolve(manifest.dir, rule.from);
        const target = safeResolve(deployPath, rule.to, "deploy directory");
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.cp(src, target, { recursive: true, force: true });
        return target;
      });
      written.push(dst);
    }

    if (manifest.deploy.wrapper) {
      const wrapper = wrapperPath(deployPath, manifest);
      await step("write wrapper", () => fs.writeFile(wrapper, renderWrapperScript(manifest), { mode: 0o755 }));
      written.push(wrapper);
    }

    const commands: CommandNode[] = await step("generate docs", async () => {
      const source =
        options.helpSource ?? binaryHelpSource(job.stagedBinary, { timeoutMs: job.helpTimeoutMs, log });
      const tree = await introspectCommands(source, log.child("introspect"));
      const template = await readTemplate(manifest);
      const content = renderSkillDocs({ deployPath, manifest, values: job.values, commands: tree, template });
      await fs.writeFile(docsPath(deployPath, manifest), content, { mode: 0o644 });
      return tree;
    });
    written.push(docsPath(deployPath, manifest));

    await step("remove staging directory", () => fs.rm(job.stagingDir, { recursive: true, force: true }));

    log.info(`deployed ${manifest.name} to ${deployPath}`);
    return { ok: true, deployPath, written, commands };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`deploy of ${manifest.name} failed: ${message}`);
    return { ok: false, error: message, written };
  }
}
