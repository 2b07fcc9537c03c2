import dotenv from 'dotenv';
import { z } from 'zod';
import { PayrollError, PayrollErrorCode } from '../errors';
import { PayRules } from '../core/rules';

const logLevelSchema = z
  .enum(['silent', 'error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .default('info');

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  PAYROLL_LOG_LEVEL: logLevelSchema,
  PAYROLL_LEDGER_MAX_PERIODS: z.coerce.number().int().positive().optional(),
  PAYROLL_PERIOD_ANCHOR: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

let loaded = false;

export function loadEnvConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (!loaded && source === process.env) {
    dotenv.config();
    loaded = true;
  }
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new PayrollError({
      code: PayrollErrorCode.INVALID_CONFIG,
      message: `[config] invalid environment: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/** Log level from the process environment as it stands; an unknown value reads as `info`. */
export function logLevelFrom(source: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = logLevelSchema.safeParse(source.PAYROLL_LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

/** Rule overrides a host can pass to the calculators; the calculators never read the environment. */
export function ruleOverridesFrom(env: EnvConfig): Partial<PayRules> {
  return env.PAYROLL_LEDGER_MAX_PERIODS === undefined
    ? {}
    : { ledgerMaxPeriods: env.PAYROLL_LEDGER_MAX_PERIODS };
}
