import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment schema. Parsed once by `ConfigModule.forRoot({ validate })`;
 * services read the typed result through `ConfigService<Env, true>`.
 */
export const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
  PORT: z.coerce.number().int().positive().default(3000),
  QUIZ_DIRECTORY: z.string().min(1).default('./quizzes'),
  QUIZ_QUESTION_COUNT: z.coerce.number().int().min(1).max(100).optional(),
  QUIZ_RANDOM_ORDER: booleanFlag,
  QUIZ_TIMER_DURATION: z.coerce.number().int().min(5).max(300).default(30),
  // Pause between an answer reveal and the next question.
  QUIZ_ADVANCE_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(250),
  QUIZ_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates raw environment variables.
 *
 * Empty strings are treated as unset so that `QUIZ_QUESTION_COUNT=` in a
 * `.env` file falls back to "use all questions".
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(raw: Record<string, unknown>): Env {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== '') cleaned[key] = value;
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${details}`);
  }
  return result.data;
}
