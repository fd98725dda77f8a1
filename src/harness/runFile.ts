import type { CorpusFile } from "../corpus/enumerate";
import { classifyError, combinedOutput, dominantExitCode } from "../classify/classifyError";
import { extractStructureStats } from "../stats/structureStats";
import type { RunResult } from "../types/runResult";
import { checkDeterminism } from "./determinism";
import { type InvocationResult, type RunCommandOptions, runCommand } from "./exec";

export type ParserSubcommand = "info" | "json" | "markdown";

export type Invoker = (subcommand: ParserSubcommand, filePath: string) => Promise<InvocationResult>;

export function parserInvoker(parserBin: string, options: RunCommandOptions): Invoker {
  return (subcommand, filePath) => runCommand(parserBin, [subcommand, filePath], options);
}

export interface RunFileOptions {
  invoke: Invoker;
  checkMarkdown: boolean;
}

function emptyResult(file: CorpusFile, ok: boolean, timingMs: number): RunResult {
  return {
    relpath: file.relpath,
    category: file.category,
    size_bytes: file.sizeBytes,
    ok,
    error: null,
    timing_ms: timingMs,
    out_sha256_a: null,
    out_sha256_b: null,
    deterministic: null,
    md_sha256_a: null,
    md_sha256_b: null,
    md_deterministic: null,
    sections: null,
    paragraphs: null,
    tables: null
  };
}

/**
 * Runs every configured invocation for one file, one after another. The two
 * json runs (and the two markdown runs) are separate processes so their
 * outputs can be compared for determinism.
 */
export async function runFile(file: CorpusFile, options: RunFileOptions): Promise<RunResult> {
  const { invoke } = options;

  // info first: surfaces encryption and distribution locks early
  const info = await invoke("info", file.absPath);
  const jsonA = await invoke("json", file.absPath);
  const jsonB = await invoke("json", file.absPath);

  const markdown: InvocationResult[] = [];
  if (options.checkMarkdown) {
    markdown.push(await invoke("markdown", file.absPath));
    markdown.push(await invoke("markdown", file.absPath));
  }

  const invocations = [info, jsonA, jsonB, ...markdown];
  const ok = invocations.every((invocation) => invocation.exitCode === 0);
  const timingMs = invocations.reduce((sum, invocation) => sum + invocation.elapsedMs, 0);
  const result = emptyResult(file, ok, timingMs);

  if (!ok) {
    // The second json run is ranked too, so a timeout there alone still reads as a timeout.
    result.error = classifyError(
      combinedOutput(invocations),
      dominantExitCode([jsonA, info, jsonB, ...markdown])
    );
    return result;
  }

  const json = checkDeterminism(jsonA.stdoutSha256, jsonB.stdoutSha256);
  result.out_sha256_a = json.sha_a;
  result.out_sha256_b = json.sha_b;
  result.deterministic = json.deterministic;

  if (markdown.length === 2) {
    const md = checkDeterminism(markdown[0].stdoutSha256, markdown[1].stdoutSha256);
    result.md_sha256_a = md.sha_a;
    result.md_sha256_b = md.sha_b;
    result.md_deterministic = md.deterministic;
  }

  const stats = extractStructureStats(jsonA.stdout);
  if (stats) {
    result.sections = stats.sections;
    result.paragraphs = stats.paragraphs;
    result.tables = stats.tables;
  }
  return result;
}
