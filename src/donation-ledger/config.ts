/**
 * Donation Ledger - Configuration
 *
 * Environment variable overrides, validated once at startup.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

export const LedgerConfigSchema = z.object({
  LEDGER_ID: z.string().trim().min(1).default('food-ledger'),
  LEDGER_ADMIN: z.string().trim().min(1, 'LEDGER_ADMIN must name the initial admin identity'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type LedgerEnv = z.infer<typeof LedgerConfigSchema>;

export interface LedgerConfig {
  ledgerId: string;
  admin: string;
  logLevel: LedgerEnv['LOG_LEVEL'];
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid ledger configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read ledger settings from `env`. When reading `process.env`, a `.env`
 * file in the working directory is loaded first.
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  if (env === process.env) {
    loadEnv();
  }

  const parsed = LedgerConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    ledgerId: parsed.data.LEDGER_ID,
    admin: parsed.data.LEDGER_ADMIN,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
