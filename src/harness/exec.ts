import { spawn } from "child_process";
import { createHash } from "crypto";
import { constants } from "os";

/** Exit code reported for an invocation killed at its deadline. */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when the program could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

const STREAM_DRAIN_MS = 500;

export interface InvocationResult {
  exitCode: number;
  stdout: Buffer;
  /** SHA-256 of the whole stdout stream, including bytes past the capture limit. */
  stdoutSha256: string;
  stderr: Buffer;
  elapsedMs: number;
  timedOut: boolean;
  /** True when either stream exceeded maxOutputBytes and was cut. */
  truncated: boolean;
}

export interface RunCommandOptions {
  timeoutMs: number;
  maxOutputBytes?: number;
}

class BoundedCapture {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (kept.length < chunk.length) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.size);
  }
}

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(constants.signals));

function signalExitCode(signal: NodeJS.Signals): number {
  const signalNumber = SIGNAL_NUMBERS.get(signal);
  return signalNumber === undefined ? 1 : 128 + signalNumber;
}

function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return signalExitCode(signal);
  return 1;
}

/**
 * Runs a command without a shell and resolves once the child has exited and
 * its streams are closed. Never rejects: spawn failures and timeouts are
 * reported through the exit code. A timed-out child is SIGKILLed and the
 * output it produced before the deadline is kept.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions
): Promise<InvocationResult> {
  const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const startedAt = Date.now();

  return new Promise((resolve) => {
    const stdout = new BoundedCapture(limit);
    const stderr = new BoundedCapture(limit);
    const stdoutDigest = createHash("sha256");
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutDigest.update(chunk);
      stdout.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    const finish = (exitCode: number): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout: stdout.toBuffer(),
        stdoutSha256: stdoutDigest.digest("hex"),
        stderr: stderr.toBuffer(),
        elapsedMs: Date.now() - startedAt,
        timedOut,
        truncated: stdout.truncated || stderr.truncated
      });
    };

    child.on("error", (error) => {
      stderr.push(Buffer.from(error.message, "utf8"));
      finish(SPAWN_FAILURE_EXIT_CODE);
    });

    // A grandchild can keep the pipes open after the kill; give the streams a
    // moment to drain, then drop them so "close" still fires.
    child.on("exit", () => {
      if (!timedOut) return;
      const drain = setTimeout(() => {
        child.stdout.destroy();
        child.stderr.destroy();
      }, STREAM_DRAIN_MS);
      drain.unref();
    });

    child.on("close", (code, signal) => {
      finish(timedOut ? TIMEOUT_EXIT_CODE : exitCodeFor(code, signal));
    });
  });
}
