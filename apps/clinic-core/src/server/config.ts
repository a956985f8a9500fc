import { z } from 'zod';

const numericString = z.string().regex(/^\d+$/).transform(Number);

const clinicCoreEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']),
  HOST: z.string().min(1),
  PORT: numericString,
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  DATABASE_URL: z
    .string()
    .min(1)
    .refine((value) => value.startsWith('postgresql://') || value === 'memory:', {
      message: 'Must be a postgresql:// URL or memory:',
    }),
  DATABASE_POOL_MAX: numericString.default('10'),
  DATABASE_STATEMENT_TIMEOUT_MS: numericString.default('5000'),
  TRANSACTION_MAX_ATTEMPTS: numericString
    .refine((value) => value >= 1, { message: 'Must be at least 1' })
    .default('3'),
  CLINIC_SERVICE_SHARED_TOKEN: z.string().min(16),
  API_RATE_LIMIT_PER_MINUTE: numericString.default('100'),
});

export type ClinicCoreConfig = z.infer<typeof clinicCoreEnvSchema>;

export function isInMemoryDatabase(config: Pick<ClinicCoreConfig, 'DATABASE_URL'>): boolean {
  return config.DATABASE_URL === 'memory:';
}

export function loadClinicCoreConfig(
  source: NodeJS.ProcessEnv = process.env,
): ClinicCoreConfig {
  try {
    return clinicCoreEnvSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issueText = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Configuration errors: ${issueText}`);
    }

    throw error;
  }
}
