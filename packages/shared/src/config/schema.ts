import { z } from 'zod';

/** Five minutes: generous for interactive use, fixed rather than derived from case size. */
export const DEFAULT_TIMEOUT_MS = 300_000;

export const HarnessConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  // Solver concurrency safety is asserted externally, so the pool is sequential by default.
  concurrency: z.number().int().positive().default(1),
  killGraceMs: z.number().int().nonnegative().default(2_000),
  maxOutputBytes: z.number().int().positive().default(10 * 1024 * 1024),
});

export const SolverConfigSchema = z.object({
  launcher: z.array(z.string().min(1)).default([]),
  args: z.array(z.string()).default([]),
  payload: z.enum(['stdin', 'path']).default('stdin'),
  env: z.record(z.string()).default({}),
  envAllowlist: z.array(z.string()).default([]),
});

export const CasesConfigSchema = z.object({
  baselineFile: z.string().min(1).default('baseline.csv'),
  extensions: z.array(z.string().regex(/^\./, 'extensions must start with "."')).default([]),
});

export const ReconcileConfigSchema = z.object({
  sense: z.enum(['minimize', 'maximize']).default('minimize'),
  tolerance: z.number().nonnegative().default(1e-6),
});

export const LedgerConfigSchema = z.object({
  delimiter: z.enum([',', ';', '\t']).default(','),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  harness: HarnessConfigSchema.default({}),
  solver: SolverConfigSchema.default({}),
  cases: CasesConfigSchema.default({}),
  reconcile: ReconcileConfigSchema.default({}),
  ledger: LedgerConfigSchema.default({}),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type SolverConfig = z.infer<typeof SolverConfigSchema>;
export type CasesConfig = z.infer<typeof CasesConfigSchema>;
export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/** Partial configuration as it appears in YAML files and CLI flags. */
export type ConfigInput = z.input<typeof ConfigSchema>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
