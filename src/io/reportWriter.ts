import type { GateSummary } from "../types/gateSummary";
import type { RunResult } from "../types/runResult";
import { appendJsonLine, createEmptyExclusive, pathExists, writeJsonExclusive } from "../utils/fs";
import { assertValidSchema, getSchemaValidator } from "../validation/jsonSchema";
import { type ReportPaths, reportPaths } from "./paths";

/**
 * Owns the two artifacts of one run. Both are created exclusively, so a
 * previous run's reports are never replaced.
 */
export class ReportWriter {
  readonly detailsPath: string;
  readonly summaryPath: string;

  private constructor(paths: ReportPaths) {
    this.detailsPath = paths.detailsPath;
    this.summaryPath = paths.summaryPath;
  }

  static async open(reportsDir: string, stamp: string): Promise<ReportWriter> {
    const paths = reportPaths(reportsDir, stamp);
    if (await pathExists(paths.summaryPath)) {
      throw new Error(`Refusing to overwrite existing report: ${paths.summaryPath}`);
    }
    try {
      await createEmptyExclusive(paths.detailsPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Could not create details report ${paths.detailsPath}: ${message}`);
    }
    return new ReportWriter(paths);
  }

  async appendResult(result: RunResult): Promise<void> {
    await appendJsonLine(this.detailsPath, result);
  }

  async writeSummary(summary: GateSummary): Promise<void> {
    assertValidSchema(getSchemaValidator("gate_summary"), summary, "Gate summary");
    await writeJsonExclusive(this.summaryPath, summary);
  }
}
