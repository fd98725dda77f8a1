import { describe, expect, it } from "vitest";
import type { CorpusFile } from "../src/corpus/enumerate";
import { type InvocationResult, TIMEOUT_EXIT_CODE } from "../src/harness/exec";
import { type Invoker, type ParserSubcommand, runFile } from "../src/harness/runFile";
import { sha256Hex } from "../src/utils/hash";
import { SAMPLE_DOCUMENT, invocation } from "./helpers";

const FILE: CorpusFile = {
  absPath: "/corpus/a/doc.hwp",
  relpath: "a/doc.hwp",
  category: "A",
  sizeBytes: 2048
};

interface ScriptedInvoker {
  invoke: Invoker;
  calls: string[];
}

function scripted(responses: Partial<Record<ParserSubcommand, InvocationResult[]>>): ScriptedInvoker {
  const calls: string[] = [];
  const queues: Record<ParserSubcommand, InvocationResult[]> = {
    info: [...(responses.info ?? [])],
    json: [...(responses.json ?? [])],
    markdown: [...(responses.markdown ?? [])]
  };
  const invoke: Invoker = async (subcommand, filePath) => {
    calls.push(`${subcommand} ${filePath}`);
    return queues[subcommand].shift() ?? invocation();
  };
  return { invoke, calls };
}

const doc = (elapsedMs = 1) => invocation({ stdout: Buffer.from(SAMPLE_DOCUMENT), elapsedMs });

describe("runFile", () => {
  it("runs info once and json twice, and records a deterministic success", async () => {
    const { invoke, calls } = scripted({
      info: [invocation({ elapsedMs: 5 })],
      json: [doc(10), doc(12)]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(calls).toEqual(["info /corpus/a/doc.hwp", "json /corpus/a/doc.hwp", "json /corpus/a/doc.hwp"]);
    expect(result).toEqual({
      relpath: "a/doc.hwp",
      category: "A",
      size_bytes: 2048,
      ok: true,
      error: null,
      timing_ms: 27,
      out_sha256_a: sha256Hex(SAMPLE_DOCUMENT),
      out_sha256_b: sha256Hex(SAMPLE_DOCUMENT),
      deterministic: true,
      md_sha256_a: null,
      md_sha256_b: null,
      md_deterministic: null,
      sections: 3,
      paragraphs: 2,
      tables: 1
    });
  });

  it("flags differing json outputs as nondeterministic", async () => {
    const { invoke } = scripted({
      json: [doc(), invocation({ stdout: Buffer.from(SAMPLE_DOCUMENT.replace("table", "tablf")) })]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(result.ok).toBe(true);
    expect(result.deterministic).toBe(false);
    expect(result.tables).toBe(1);
  });

  it("compares full outputs even when the captured bytes match", async () => {
    const captured = Buffer.from("abcd");
    const { invoke } = scripted({
      json: [
        invocation({ stdout: captured, stdoutSha256: sha256Hex("abcdX"), truncated: true }),
        invocation({ stdout: captured, stdoutSha256: sha256Hex("abcdY"), truncated: true })
      ]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(result.ok).toBe(true);
    expect(result.out_sha256_a).toBe(sha256Hex("abcdX"));
    expect(result.out_sha256_b).toBe(sha256Hex("abcdY"));
    expect(result.deterministic).toBe(false);
  });

  it("checks markdown determinism separately when enabled", async () => {
    const { invoke, calls } = scripted({
      json: [doc(), doc()],
      markdown: [invocation({ stdout: Buffer.from("# One") }), invocation({ stdout: Buffer.from("# Two") })]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: true });

    expect(calls).toHaveLength(5);
    expect(result.deterministic).toBe(true);
    expect(result.md_sha256_a).toBe(sha256Hex("# One"));
    expect(result.md_sha256_b).toBe(sha256Hex("# Two"));
    expect(result.md_deterministic).toBe(false);
    expect(result.timing_ms).toBe(5);
  });

  it("classifies a failed info call and leaves output fields empty", async () => {
    const { invoke } = scripted({
      info: [invocation({ exitCode: 1, stderr: Buffer.from("Error: file is Encrypted") })],
      json: [doc(), doc()]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(result.ok).toBe(false);
    expect(result.error).toBe("encrypted");
    expect(result.out_sha256_a).toBeNull();
    expect(result.deterministic).toBeNull();
    expect(result.sections).toBeNull();
  });

  it("records a timeout on the second json run", async () => {
    const { invoke } = scripted({
      json: [doc(), invocation({ exitCode: TIMEOUT_EXIT_CODE, timedOut: true })]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(result.ok).toBe(false);
    expect(result.error).toBe("timeout");
  });

  it("prefers higher-priority text over a timeout", async () => {
    const { invoke } = scripted({
      json: [invocation({ exitCode: TIMEOUT_EXIT_CODE, timedOut: true, stdout: Buffer.from("encrypted stream 3") })]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(result.error).toBe("encrypted");
  });

  it("fails the file when a markdown run fails", async () => {
    const { invoke } = scripted({
      json: [doc(), doc()],
      markdown: [invocation(), invocation({ exitCode: 101, stderr: Buffer.from("panicked at renderer") })]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: true });

    expect(result.ok).toBe(false);
    expect(result.error).toBe("parse_error");
    expect(result.md_deterministic).toBeNull();
  });

  it("keeps success when the structured output cannot be parsed", async () => {
    const { invoke } = scripted({
      json: [invocation({ stdout: Buffer.from("not json") }), invocation({ stdout: Buffer.from("not json") })]
    });

    const result = await runFile(FILE, { invoke, checkMarkdown: false });

    expect(result.ok).toBe(true);
    expect(result.deterministic).toBe(true);
    expect(result.sections).toBeNull();
    expect(result.paragraphs).toBeNull();
    expect(result.tables).toBeNull();
  });
});
