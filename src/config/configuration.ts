import { z } from 'zod';

const intFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => parseInt(v, 10))
    .pipe(z.number().int().positive());

/**
 * Environment configuration schema with zod validation.
 * The app will fail fast on startup if required variables are missing.
 */
const envSchema = z.object({
  // OpenAI (or any OpenAI-compatible router)
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_BASE_URL: z.string().url().optional(),

  // Models per stage
  MODEL_GREETING: z.string().default('gpt-4o-mini'),
  MODEL_LOCATION: z.string().default('gpt-4o-mini'),
  MODEL_ORDERING: z.string().default('gpt-4o'),
  MODEL_CHECKOUT: z.string().default('gpt-4o'),

  // Menu embeddings
  EMBEDDING_MODEL: z.string().default('text-embedding-3-large'),
  EMBEDDING_DIMENSIONS: intFromEnv('1024'),

  // Token ceilings per stage (ordering carries the menu results, so it gets the most room)
  CONTEXT_CEILING_GREETING: intFromEnv('4000'),
  CONTEXT_CEILING_LOCATION: intFromEnv('6000'),
  CONTEXT_CEILING_ORDERING: intFromEnv('12000'),
  CONTEXT_CEILING_CHECKOUT: intFromEnv('8000'),

  // Sessions
  SESSION_TIMEOUT_MINUTES: intFromEnv('10'),

  // Inference retries
  INFERENCE_MAX_ATTEMPTS: intFromEnv('3'),
  INFERENCE_BASE_DELAY_MS: intFromEnv('500'),

  // Static data
  CATALOG_PATH: z.string().default('./data/menu.json'),
  COVERAGE_PATH: z.string().default('./data/coverage_zones.json'),

  // Support line shown when the assistant cannot continue
  HUMAN_CONTACT_NUMBER: z.string().default('920001234'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate and parse environment variables.
 * Throws a descriptive error if validation fails.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * NestJS configuration factory.
 * Called by ConfigModule.forRoot({ load: [configuration] })
 */
export default () => {
  const env = validateEnv();

  return {
    nodeEnv: env.NODE_ENV,

    openai: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
    },

    models: {
      greeting: env.MODEL_GREETING,
      location: env.MODEL_LOCATION,
      ordering: env.MODEL_ORDERING,
      checkout: env.MODEL_CHECKOUT,
    },

    context: {
      ceilings: {
        greeting: env.CONTEXT_CEILING_GREETING,
        location: env.CONTEXT_CEILING_LOCATION,
        ordering: env.CONTEXT_CEILING_ORDERING,
        checkout: env.CONTEXT_CEILING_CHECKOUT,
      },
    },

    session: {
      timeoutMinutes: env.SESSION_TIMEOUT_MINUTES,
    },

    inference: {
      maxAttempts: env.INFERENCE_MAX_ATTEMPTS,
      baseDelayMs: env.INFERENCE_BASE_DELAY_MS,
    },

    paths: {
      catalog: env.CATALOG_PATH,
      coverage: env.COVERAGE_PATH,
    },

    support: {
      humanContact: env.HUMAN_CONTACT_NUMBER,
    },
  };
};
