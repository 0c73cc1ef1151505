import { spawn } from "node:child_process";
import type { ProcessResult, RunProcessOptions } from "./types.js";

const DEFAULT_TIMEOUT = 5 * 60_000;
/** Delay between SIGTERM and SIGKILL once the timeout has fired. */
export const KILL_GRACE_MS = 2_000;

/**
 * Spawn `command` and collect its combined output. Never rejects: spawn
 * failures and timeouts are reported through `error`.
 */
export function runProcess(command: string, args: string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  return new Promise<ProcessResult>((resolve) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let output = "";
    let killed = false;
    let settled = false;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(forceKill);
      resolve(result);
    };

    let forceKill: NodeJS.Timeout | undefined;
    const timer = setTimeout(() => {
      killed = true;
      proc.kill("SIGTERM");
      forceKill = setTimeout(() => proc.kill("SIGKILL"), KILL_GRACE_MS);
    }, timeout);

    // Decoding on the stream keeps multi-byte characters split across chunks intact.
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (chunk: string) => {
      output += chunk;
    });

    proc.stderr.on("data", (chunk: string) => {
      output += chunk;
    });

    proc.on("error", (err) => {
      finish({ code: null, output, error: `Process error: ${err.message}` });
    });

    proc.on("close", (code) => {
      if (killed) {
        finish({ code: null, output, error: `Timeout after ${timeout}ms` });
        return;
      }
      if (code !== 0) {
        finish({ code, output, error: `exit status ${code ?? "unknown"}` });
        return;
      }
      finish({ code, output });
    });
  });
}
