import { z } from 'zod';

const optionalSetting = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

/** Blank variables (`KEY=`) fall through to the default instead of coercing to 0. */
function blankAsUnset(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const numberSetting = (schema: z.ZodNumber, fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().pipe(schema).default(fallback));

export const configSchema = z.object({
  PORT: numberSetting(z.number().int().positive(), 3000),
  QUIZ_FILE: z.string().trim().min(1).default('quiz.json'),
  VERIFY_TOKEN: optionalSetting,
  WHATSAPP_TOKEN: optionalSetting,
  WHATSAPP_PHONE_NUMBER_ID: optionalSetting,
  GRAPH_API_VERSION: z.string().trim().min(1).default('v17.0'),
  SESSION_TTL_MINUTES: numberSetting(z.number().min(0), 30),
  SEND_TIMEOUT_MS: numberSetting(z.number().int().positive(), 10_000),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Validates the raw environment for `ConfigModule.forRoot`. Unknown keys are
 * dropped; the returned object is what `ConfigService` serves.
 */
export function validateConfig(env: Record<string, unknown>): AppConfig {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}
