#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runGate } from "../commands/gate";
import { runValidate } from "../commands/validate";
import { GATE_DEFAULTS, type GateCliOptions, gateConfigFromCli } from "../config/gateConfig";
import { DEFAULT_THRESHOLDS } from "../gate/thresholds";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.CORPUS_GATE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const envPath = resolveEnvPath(process.argv.slice(2), path.resolve(process.cwd(), ".env"));
dotenv.config({ path: envPath });

function toNumber(value: string): number {
  return Number(value);
}

const program = new Command();

program
  .name("corpus-gate")
  .description("Runs a document parser over a private local corpus and gates on success and determinism")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides CORPUS_GATE_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("gate")
  .description("Run the parser over the corpus, write reports, and exit 0 (pass), 2 (fail) or 3 (setup error)")
  .option("--corpus-dir <dir>", "Corpus directory", process.env.CORPUS_GATE_CORPUS_DIR ?? GATE_DEFAULTS.corpusDir)
  .option("--manifest <path>", "Corpus manifest JSON", process.env.CORPUS_GATE_MANIFEST ?? GATE_DEFAULTS.manifestPath)
  .option("--parser-bin <path>", "Parser executable under test", process.env.CORPUS_GATE_PARSER_BIN ?? GATE_DEFAULTS.parserBin)
  .option("--extension <ext>", "File extension used when scanning the corpus", GATE_DEFAULTS.extension)
  .option("--timeout-s <seconds>", "Timeout per parser invocation", toNumber, GATE_DEFAULTS.timeoutSeconds)
  .option("--check-markdown", "Also run `markdown` twice per file for determinism (slower)")
  .option("--min-corpus-size <n>", "Minimum number of files", toNumber, DEFAULT_THRESHOLDS.min_corpus_size)
  .option("--min-success-a <rate>", "Minimum success rate for category A", toNumber, DEFAULT_THRESHOLDS.min_success.A)
  .option("--min-success-b <rate>", "Minimum success rate for category B", toNumber, DEFAULT_THRESHOLDS.min_success.B)
  .option("--min-success-c <rate>", "Minimum success rate for category C", toNumber, DEFAULT_THRESHOLDS.min_success.C)
  .option(
    "--min-deterministic-rate <rate>",
    "Minimum share of successful files with identical repeated output",
    toNumber,
    DEFAULT_THRESHOLDS.min_deterministic_rate
  )
  .option("--max-files <n>", "Process at most n files (0 = no limit)", toNumber, 0)
  .option("--reports-dir <dir>", "Directory for the details and summary reports", GATE_DEFAULTS.reportsDir)
  .option("--ci", "Print a compact summary line")
  .action(async (opts: GateCliOptions) => {
    const outcome = await runGate(gateConfigFromCli(opts));
    process.exitCode = outcome.exitCode;
  });

program
  .command("validate")
  .description("Check a summary and its details file against the report schemas")
  .requiredOption("--summary <path>", "Path to a <timestamp>_summary.json")
  .option("--details <path>", "Details file (defaults to the summary's sibling _details.jsonl)")
  .action(async (opts: { summary: string; details?: string }) => {
    await runValidate({ summaryPath: opts.summary, detailsPath: opts.details });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
