import path from "path";

export interface ReportPaths {
  detailsPath: string;
  summaryPath: string;
}

export function detailsPath(reportsDir: string, stamp: string): string {
  return path.join(reportsDir, `${stamp}_details.jsonl`);
}

export function summaryPath(reportsDir: string, stamp: string): string {
  return path.join(reportsDir, `${stamp}_summary.json`);
}

export function reportPaths(reportsDir: string, stamp: string): ReportPaths {
  return {
    detailsPath: detailsPath(reportsDir, stamp),
    summaryPath: summaryPath(reportsDir, stamp)
  };
}

/** Details file written alongside a summary produced by the same run. */
export function detailsPathForSummary(summaryFilePath: string): string {
  return summaryFilePath.replace(/_summary\.json$/, "_details.jsonl");
}
