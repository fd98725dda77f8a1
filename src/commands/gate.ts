import path from "path";
import type { GateConfig } from "../config/gateConfig";
import { aggregateResults } from "../aggregate/aggregate";
import { type CorpusFile, enumerateCorpus } from "../corpus/enumerate";
import { SetupError } from "../gate/setupError";
import { evaluateGate } from "../gate/thresholds";
import { type Invoker, parserInvoker, runFile } from "../harness/runFile";
import { buildGateSummary } from "../io/gateSummary";
import { ReportWriter } from "../io/reportWriter";
import { loadCategoryMap } from "../manifest/loadManifest";
import type { GateSummary } from "../types/gateSummary";
import type { RunResult } from "../types/runResult";
import { pathExists } from "../utils/fs";
import { runStamp, utcIsoSeconds } from "../utils/time";

export const EXIT_PASSED = 0;
export const EXIT_GATE_FAILED = 2;
export const EXIT_SETUP_ERROR = 3;

export type GateExitCode = typeof EXIT_PASSED | typeof EXIT_GATE_FAILED | typeof EXIT_SETUP_ERROR;

export interface GateDependencies {
  /** Base for relative paths in the config; defaults to the working directory. */
  rootDir?: string;
  now?: () => Date;
  /** Replaces the subprocess invoker, e.g. with an in-process fake. */
  invoke?: Invoker;
}

export interface GateOutcome {
  exitCode: GateExitCode;
  summary: GateSummary | null;
  summaryPath: string | null;
}

const LOG_PREFIX = "[corpus-gate]";

function compactLine(summary: GateSummary): string {
  const rates = summary.per_category.success_rate;
  return (
    `${LOG_PREFIX} total=${summary.total_files} ok=${summary.ok} det_rate=${summary.deterministic_rate} ` +
    `A=${rates.A} B=${rates.B} C=${rates.C} p95=${summary.timing_ms.p95}ms`
  );
}

function progressLine(index: number, total: number, result: RunResult): string {
  const status = result.ok ? (result.deterministic ? "ok" : "ok (nondeterministic)") : `FAIL ${result.error}`;
  return `${LOG_PREFIX} [${index}/${total}] ${status} ${result.relpath} (${result.timing_ms}ms)`;
}

interface ResolvedPaths {
  corpusDir: string;
  manifestPath: string;
  parserBin: string;
  reportsDir: string;
}

/** Setup checks, in order: corpus dir, resolved file list, parser binary. */
async function prepareRun(config: GateConfig, paths: ResolvedPaths): Promise<CorpusFile[] | SetupError> {
  try {
    const categoryMap = await loadCategoryMap(paths.manifestPath);
    const files = await enumerateCorpus({
      corpusDir: paths.corpusDir,
      categoryMap,
      extension: config.extension,
      maxFiles: config.maxFiles
    });
    if (!(await pathExists(paths.parserBin))) {
      throw new SetupError("parser_missing", `parser binary not found: ${paths.parserBin}`);
    }
    return files;
  } catch (error) {
    if (error instanceof SetupError) return error;
    throw error;
  }
}

export async function runGate(config: GateConfig, deps: GateDependencies = {}): Promise<GateOutcome> {
  const rootDir = path.resolve(deps.rootDir ?? process.cwd());
  const now = deps.now ?? (() => new Date());
  const paths: ResolvedPaths = {
    corpusDir: path.resolve(rootDir, config.corpusDir),
    manifestPath: path.resolve(rootDir, config.manifestPath),
    parserBin: path.resolve(rootDir, config.parserBin),
    reportsDir: path.resolve(rootDir, config.reportsDir)
  };

  const files = await prepareRun(config, paths);
  if (files instanceof SetupError) {
    console.error(`${LOG_PREFIX} ${files.message}`);
    return { exitCode: EXIT_SETUP_ERROR, summary: null, summaryPath: null };
  }

  const startedAt = now();
  const writer = await ReportWriter.open(paths.reportsDir, runStamp(startedAt));
  const invoke = deps.invoke ?? parserInvoker(paths.parserBin, { timeoutMs: config.timeoutMs });

  const results: RunResult[] = [];
  for (const [index, file] of files.entries()) {
    const result = await runFile(file, { invoke, checkMarkdown: config.checkMarkdown });
    await writer.appendResult(result);
    results.push(result);
    if (!config.ci) {
      console.log(progressLine(index + 1, files.length, result));
    }
  }

  const aggregate = aggregateResults(results);
  const decision = evaluateGate(aggregate, config.thresholds);
  const summary = buildGateSummary({
    timestamp: runStamp(startedAt),
    generatedAt: utcIsoSeconds(startedAt),
    aggregate,
    thresholds: config.thresholds,
    decision,
    detailsPath: path.relative(rootDir, writer.detailsPath),
    summaryPath: path.relative(rootDir, writer.summaryPath)
  });
  await writer.writeSummary(summary);

  if (config.ci) {
    console.log(compactLine(summary));
    console.log(`${LOG_PREFIX} summary: ${writer.summaryPath}`);
  }

  if (decision.passed) {
    if (!config.ci) console.log(`${LOG_PREFIX} PASSED thresholds (summary: ${writer.summaryPath})`);
    return { exitCode: EXIT_PASSED, summary, summaryPath: writer.summaryPath };
  }

  console.log(`${LOG_PREFIX} FAILED thresholds`);
  for (const failure of summary.gate.failures) {
    console.log(`${LOG_PREFIX}   ${failure.check}: ${failure.actual} < ${failure.required}`);
  }
  if (!config.ci) console.log(JSON.stringify(summary, null, 2));
  return { exitCode: EXIT_GATE_FAILED, summary, summaryPath: writer.summaryPath };
}
