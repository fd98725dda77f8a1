import { describe, expect, it } from "vitest";
import { SPAWN_FAILURE_EXIT_CODE, TIMEOUT_EXIT_CODE, runCommand } from "../src/harness/exec";
import { sha256Hex } from "../src/utils/hash";

function node(script: string, timeoutMs = 10000, maxOutputBytes?: number) {
  return runCommand(process.execPath, ["-e", script], { timeoutMs, maxOutputBytes });
}

describe("runCommand", () => {
  it("captures exit code and both streams", async () => {
    const result = await node("process.stdout.write('hello'); process.stderr.write('warn')");

    expect(result.exitCode).toBe(0);
    expect(result.stdout.toString("utf8")).toBe("hello");
    expect(result.stderr.toString("utf8")).toBe("warn");
    expect(result.timedOut).toBe(false);
    expect(result.truncated).toBe(false);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it("reports a non-zero exit code", async () => {
    const result = await node("process.stderr.write('bad record'); process.exit(3)");

    expect(result.exitCode).toBe(3);
    expect(result.stderr.toString("utf8")).toBe("bad record");
  });

  it("kills a child at the deadline and keeps its partial output", async () => {
    const result = await node("process.stdout.write('partial encrypted'); setInterval(() => {}, 1000)", 1500);

    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(result.timedOut).toBe(true);
    expect(result.stdout.toString("utf8")).toBe("partial encrypted");
    expect(result.elapsedMs).toBeGreaterThanOrEqual(1500);
  });

  it("maps a signal death to 128 + signal number", async () => {
    const result = await node("process.kill(process.pid, 'SIGTERM'); setInterval(() => {}, 1000)");
    expect(result.exitCode).toBe(143);
    expect(result.timedOut).toBe(false);
  });

  it("bounds captured output", async () => {
    const result = await node("process.stdout.write('abcdefgh')", 10000, 4);

    expect(result.stdout.toString("utf8")).toBe("abcd");
    expect(result.truncated).toBe(true);
  });

  it("hashes the whole stdout stream past the capture limit", async () => {
    const first = await node("process.stdout.write('abcdX')", 10000, 4);
    const second = await node("process.stdout.write('abcdY')", 10000, 4);

    expect(first.stdout.toString("utf8")).toBe("abcd");
    expect(second.stdout.toString("utf8")).toBe("abcd");
    expect(first.stdoutSha256).toBe(sha256Hex("abcdX"));
    expect(second.stdoutSha256).toBe(sha256Hex("abcdY"));
  });

  it("reports a program that cannot be started", async () => {
    const result = await runCommand("/nonexistent/corpus-gate-parser", ["info"], { timeoutMs: 1000 });

    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.stderr.toString("utf8")).toContain("ENOENT");
  });
});
