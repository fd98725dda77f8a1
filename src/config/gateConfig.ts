import { z } from "zod";

const RateSchema = z.number().min(0).max(1);

export const GateThresholdsSchema = z.object({
  min_corpus_size: z.number().int().nonnegative(),
  min_success: z.object({
    A: RateSchema,
    B: RateSchema,
    C: RateSchema
  }),
  min_deterministic_rate: RateSchema
});

export const GateConfigSchema = z.object({
  corpusDir: z.string().min(1),
  manifestPath: z.string().min(1),
  parserBin: z.string().min(1),
  extension: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  checkMarkdown: z.boolean(),
  maxFiles: z.number().int().nonnegative(),
  reportsDir: z.string().min(1),
  ci: z.boolean(),
  thresholds: GateThresholdsSchema
});

export type GateConfig = z.infer<typeof GateConfigSchema>;

export const GATE_DEFAULTS = {
  corpusDir: "corpus/local",
  manifestPath: "corpus/manifest.json",
  parserBin: "target/release/hwp",
  extension: ".hwp",
  timeoutSeconds: 30,
  reportsDir: "reports/gate"
} as const;

/** Raw values as the CLI hands them over, before validation. */
export interface GateCliOptions {
  corpusDir: string;
  manifest: string;
  parserBin: string;
  extension: string;
  timeoutS: number;
  checkMarkdown?: boolean;
  minCorpusSize: number;
  minSuccessA: number;
  minSuccessB: number;
  minSuccessC: number;
  minDeterministicRate: number;
  maxFiles: number;
  reportsDir: string;
  ci?: boolean;
}

export function parseGateConfig(raw: unknown): GateConfig {
  const parsed = GateConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid gate configuration: ${details}`);
  }
  return parsed.data;
}

export function gateConfigFromCli(options: GateCliOptions): GateConfig {
  return parseGateConfig({
    corpusDir: options.corpusDir,
    manifestPath: options.manifest,
    parserBin: options.parserBin,
    extension: options.extension,
    timeoutMs: Math.round(options.timeoutS * 1000),
    checkMarkdown: options.checkMarkdown ?? false,
    maxFiles: options.maxFiles,
    reportsDir: options.reportsDir,
    ci: options.ci ?? false,
    thresholds: {
      min_corpus_size: options.minCorpusSize,
      min_success: {
        A: options.minSuccessA,
        B: options.minSuccessB,
        C: options.minSuccessC
      },
      min_deterministic_rate: options.minDeterministicRate
    }
  });
}
