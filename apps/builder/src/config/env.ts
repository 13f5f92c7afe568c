import 'dotenv/config';
import { z } from 'zod';

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .transform(value => value.trim().toLowerCase())
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
]);

const envSchema = z.object({
  // NODE_ENV is set by the tooling (vitest sets "test"); don't put it in .env
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // SITE_ENV is the build environment consulted by compress_html.ignore.envs
  SITE_ENV: z.enum(['development', 'production']).default('production'),
  SITE_SOURCE: z.string().min(1).default('.'),
  SITE_DESTINATION: z.string().min(1).default('_site'),
  SITE_CACHE_DIR: z.string().min(1).optional(),
  SKIP_INVALID: booleanish.optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;
