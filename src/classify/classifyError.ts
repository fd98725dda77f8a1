import { TIMEOUT_EXIT_CODE } from "../harness/exec";
import type { ErrorKind } from "../types/runResult";

export interface CapturedOutput {
  exitCode: number;
  stdout: Uint8Array;
  stderr: Uint8Array;
}

interface ClassificationRule {
  kind: ErrorKind;
  matches(text: string, exitCode: number): boolean;
}

function mentions(...needles: string[]): (text: string) => boolean {
  return (text) => needles.some((needle) => text.includes(needle));
}

// Evaluated top-down, first match wins. Text rules apply whatever the exit
// code was, so partial output from a killed run can outrank "timeout".
const RULES: readonly ClassificationRule[] = [
  { kind: "encrypted", matches: mentions("encrypted", "encryption") },
  { kind: "distribution", matches: mentions("distribution") },
  { kind: "size_limit", matches: mentions("size limit", "sizelimit", "limit exceeded") },
  { kind: "timeout", matches: (_text, exitCode) => exitCode === TIMEOUT_EXIT_CODE }
];

export function classifyError(output: string, dominantExitCode: number): ErrorKind {
  const text = output.toLowerCase();
  const rule = RULES.find((candidate) => candidate.matches(text, dominantExitCode));
  return rule ? rule.kind : "parse_error";
}

/** All stderr streams, a newline, then all stdout streams, decoded as UTF-8. */
export function combinedOutput(invocations: CapturedOutput[]): string {
  const stderr = Buffer.concat(invocations.map((invocation) => invocation.stderr));
  const stdout = Buffer.concat(invocations.map((invocation) => invocation.stdout));
  return `${stderr.toString("utf8")}\n${stdout.toString("utf8")}`;
}

/** First non-zero exit code in the given priority order, or 0. */
export function dominantExitCode(invocations: CapturedOutput[]): number {
  const failed = invocations.find((invocation) => invocation.exitCode !== 0);
  return failed ? failed.exitCode : 0;
}
