/**
 * Calculator configuration
 *
 * Zod-validated environment config with defaults for the log and
 * triangle output paths.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@tally/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const configSchema = z.object({
  logPath: z.string().min(1).default('./adv_calc_logs.txt'),
  trianglePath: z.string().min(1).default('./triangle.svg'),
  fractionResults: booleanFlag.default('false'),
  maxDenominator: z.coerce.number().int().positive().default(1000),
});

export type CalculatorConfig = z.infer<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

// ── Loading ──────────────────────────────────────────────────────────────────

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalculatorConfig {
  const raw = {
    logPath: env.TALLY_LOG_PATH,
    trianglePath: env.TALLY_TRIANGLE_PATH,
    fractionResults: env.TALLY_FRACTION_RESULTS?.toLowerCase(),
    maxDenominator: env.TALLY_MAX_DENOMINATOR,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`Calculator config error: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }

  const config = result.data;
  config.logPath = resolve(expandHome(config.logPath));
  config.trianglePath = resolve(expandHome(config.trianglePath));
  return config;
}

let cached: CalculatorConfig | null = null;

export function getConfig(): CalculatorConfig {
  if (cached) return cached;
  cached = loadConfig();
  return cached;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}
