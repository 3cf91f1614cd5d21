import 'dotenv/config';
import { z } from 'zod';

const envSchema = z
  .object({
    // NODE_ENV is set by the tooling (don't set in .env)
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    CONTENT_STORE: z.enum(['memory', 'mongo']).default('memory'),
    MONGODB_URI: z.string().min(1).optional(),
    MONGODB_COLLECTION_PREFIX: z.string().default(''),
    ROOT_PAGE_TITLE: z.string().min(1).default('Home'),
    CORS_ORIGINS: z
      .string()
      .default('http://localhost:3000,http://localhost:4000')
      .transform(value =>
        value
          .split(',')
          .map(origin => origin.trim())
          .filter(origin => origin.length > 0)
      )
  })
  .superRefine((value, ctx) => {
    if (value.CONTENT_STORE === 'mongo' && !value.MONGODB_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGODB_URI'],
        message: 'MONGODB_URI is required when CONTENT_STORE=mongo'
      });
    }
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
