import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  STRUCTURED_LOGS: z
    .string()
    .optional()
    .transform((val) => (val ? val !== 'false' : true)),
  SILENT: z.string().optional(),
  ACARS_HOST: z.string().min(1).default('127.0.0.1'),
  ACARS_OUTPUT_DIR: z.string().min(1).default('acars_split'),
  ACARS_BUFFER_TIMEOUT: z
    .string()
    .default('60')
    .transform((val) => Number(val))
    .pipe(z.number().positive()),
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.flatten();
    throw new Error(
      `Invalid environment configuration: ${JSON.stringify(formatted.fieldErrors, null, 2)}`,
    );
  }

  return parsed.data;
}
