import { describe, it, expect } from "vitest";
import { runProcess } from "../src/index.js";
import { KILL_GRACE_MS } from "../src/process.js";

describe("runProcess", () => {
  it("collects stdout and stderr", async () => {
    const res = await runProcess(process.execPath, ["-e", "process.stdout.write('out\\n'); process.stderr.write('err\\n')"]);
    expect(res.code).toBe(0);
    expect(res.error).toBeUndefined();
    expect(res.output).toContain("out\n");
    expect(res.output).toContain("err\n");
  });

  it("reports a non-zero exit", async () => {
    const res = await runProcess(process.execPath, ["-e", "process.exit(3)"]);
    expect(res.code).toBe(3);
    expect(res.error).toBe("exit status 3");
  });

  it("kills a process that runs past the timeout", async () => {
    const res = await runProcess(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], { timeout: 200 });
    expect(res.code).toBeNull();
    expect(res.error).toBe("Timeout after 200ms");
  });

  it("force-kills a process that ignores SIGTERM", async () => {
    const script = "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)";
    const started = Date.now();
    const res = await runProcess(process.execPath, ["-e", script], { timeout: 300 });
    expect(res.code).toBeNull();
    expect(res.error).toBe("Timeout after 300ms");
    expect(Date.now() - started).toBeLessThan(300 + KILL_GRACE_MS + 5000);
  });

  it("keeps multi-byte characters split across chunks", async () => {
    const script =
      "process.stdout.write(Buffer.from([0xe2, 0x82])); setTimeout(() => process.stdout.write(Buffer.from([0xac, 0x0a])), 100)";
    const res = await runProcess(process.execPath, ["-e", script]);
    expect(res.output).toBe("€\n");
  });

  it("reports a command that cannot be started", async () => {
    const res = await runProcess("/nonexistent/skillforge-test-binary", []);
    expect(res.code).toBeNull();
    expect(res.error).toMatch(/^Process error: spawn \/nonexistent\/skillforge-test-binary ENOENT/);
  });
});
