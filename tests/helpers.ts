import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { InvocationResult } from "../src/harness/exec";
import type { RunResult } from "../src/types/runResult";
import { sha256Hex } from "../src/utils/hash";

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `corpus-gate-${prefix}-`));
}

export async function writeFileAt(root: string, relpath: string, content: string): Promise<string> {
  const filePath = path.join(root, relpath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
  return filePath;
}

export function invocation(overrides: Partial<InvocationResult> = {}): InvocationResult {
  const stdout = overrides.stdout ?? Buffer.from("");
  return {
    exitCode: 0,
    stdout,
    stdoutSha256: sha256Hex(stdout),
    stderr: Buffer.from(""),
    elapsedMs: 1,
    timedOut: false,
    truncated: false,
    ...overrides
  };
}

export function runResult(overrides: Partial<RunResult> = {}): RunResult {
  const ok = overrides.ok ?? true;
  return {
    relpath: "doc.hwp",
    category: null,
    size_bytes: 1,
    ok,
    error: ok ? null : "parse_error",
    timing_ms: 10,
    out_sha256_a: null,
    out_sha256_b: null,
    deterministic: ok ? true : null,
    md_sha256_a: null,
    md_sha256_b: null,
    md_deterministic: null,
    sections: null,
    paragraphs: null,
    tables: null,
    ...overrides
  };
}

export const SAMPLE_DOCUMENT = JSON.stringify({
  sections: [
    { content: [{ type: "paragraph" }, { type: "table" }, { type: "paragraph" }, { type: "image" }] },
    { content: [] },
    {}
  ]
});
