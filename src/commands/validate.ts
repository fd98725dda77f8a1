import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { detailsPathForSummary } from "../io/paths";
import { readJson } from "../utils/fs";
import { getSchemaValidator, schemaErrors } from "../validation/jsonSchema";

export interface ValidateOptions {
  summaryPath: string;
  detailsPath?: string;
}

export interface ValidationReport {
  summary_path: string;
  details_path: string;
  records: number;
  errors: string[];
}

const SummaryCountsSchema = z.object({
  total_files: z.number(),
  ok: z.number()
});

const SucceededRecordSchema = z.object({ ok: z.literal(true) });

function countOk(records: unknown[]): number {
  return records.filter((record) => SucceededRecordSchema.safeParse(record).success).length;
}

/** Checks a report pair against the artifact schemas and against each other. */
export async function validateReports(options: ValidateOptions): Promise<ValidationReport> {
  const summaryPath = path.resolve(options.summaryPath);
  const detailsPath = path.resolve(options.detailsPath ?? detailsPathForSummary(summaryPath));
  const errors: string[] = [];

  const summary = await readJson<unknown>(summaryPath);
  for (const error of schemaErrors(getSchemaValidator("gate_summary"), summary)) {
    errors.push(`summary: ${error}`);
  }

  const content = await fs.readFile(detailsPath, "utf8");
  const lines = content.split("\n").filter((line) => line.trim().length > 0);
  const records: unknown[] = [];
  const recordValidator = getSchemaValidator("run_result");
  lines.forEach((line, index) => {
    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch {
      errors.push(`details line ${index + 1}: not valid JSON`);
      return;
    }
    records.push(record);
    for (const error of schemaErrors(recordValidator, record)) {
      errors.push(`details line ${index + 1}: ${error}`);
    }
  });

  const counts = SummaryCountsSchema.safeParse(summary);
  if (counts.success) {
    if (counts.data.total_files !== lines.length) {
      errors.push(`summary total_files=${counts.data.total_files} but details has ${lines.length} record(s)`);
    }
    const ok = countOk(records);
    if (counts.data.ok !== ok) {
      errors.push(`summary ok=${counts.data.ok} but details has ${ok} successful record(s)`);
    }
  }

  return { summary_path: summaryPath, details_path: detailsPath, records: lines.length, errors };
}

export async function runValidate(options: ValidateOptions): Promise<void> {
  const report = await validateReports(options);
  if (report.errors.length > 0) {
    throw new Error(`Report validation failed:\n${report.errors.map((error) => `  - ${error}`).join("\n")}`);
  }
  console.log(`[corpus-gate] ${report.records} record(s) valid: ${report.summary_path}`);
}
