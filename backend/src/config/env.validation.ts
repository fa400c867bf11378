import { z } from 'zod';

const truthyValues = new Set(['true', '1', 'yes', 'y', 'on']);

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    AI_PROVIDER: z.enum(['openai', 'azure']).default('openai'),
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_CHAT_MODEL: z.string().trim().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().trim().default('text-embedding-3-small'),
    AZURE_OPENAI_RESOURCE_NAME: z.string().trim().optional(),
    AZURE_OPENAI_API_KEY: z.string().trim().optional(),
    AZURE_OPENAI_CHAT_DEPLOYMENT: z.string().trim().optional(),
    AZURE_OPENAI_EMBEDDING_DEPLOYMENT: z.string().trim().optional(),
    DATABASE_URL: z.string().trim().optional(),
    DATABASE_SSL: z
      .preprocess((value) => {
        if (typeof value === 'string') {
          const normalized = value.trim().toLowerCase();
          if (normalized.length === 0) {
            return undefined;
          }
          return truthyValues.has(normalized);
        }
        if (typeof value === 'number') {
          return value === 1;
        }
        return value;
      }, z.boolean().optional())
      .optional(),
    KNOWLEDGE_CHUNK_SIZE: z.coerce.number().int().positive().default(250),
    KNOWLEDGE_EMBED_CHAR_LIMIT: z.coerce
      .number()
      .int()
      .positive()
      .default(8000),
    RFP_TOP_K: z.coerce.number().int().positive().max(50).default(5),
    RFP_RESPONSE_TITLE: z.string().trim().min(1).default('RFP Response'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'test') {
      return;
    }

    if (env.AI_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message:
          'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
      });
    }

    if (env.AI_PROVIDER === 'azure') {
      const required = [
        'AZURE_OPENAI_RESOURCE_NAME',
        'AZURE_OPENAI_API_KEY',
        'AZURE_OPENAI_CHAT_DEPLOYMENT',
        'AZURE_OPENAI_EMBEDDING_DEPLOYMENT',
      ] as const;
      for (const key of required) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when AI_PROVIDER=azure outside of test environment`,
          });
        }
      }
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const messages = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed - ${messages}`);
  }
  return parsed.data;
};
