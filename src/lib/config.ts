/**
 * Application Configuration
 * Environment variables validated once at startup
 */

import { z } from 'zod';

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  supabaseUrl: z.string().url('SUPABASE_URL must be a URL'),
  supabaseAnonKey: z.string().min(1, 'SUPABASE_ANON_KEY is required'),
  supabaseServiceKey: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),
  // Comma-separated list of allowed CORS origins
  allowedOrigins: z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val.trim() === '') {
        return ['http://localhost:3000'];
      }
      return val
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean);
    }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  admin: z.object({
    username: z.string().min(3).max(50).default('admin'),
    email: z.string().email().default('admin@example.com'),
    password: z.string().min(8).optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate configuration from the environment
 * Throws a ZodError naming every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  return configSchema.parse({
    port: env['PORT'],
    nodeEnv: env['NODE_ENV'],
    supabaseUrl: env['SUPABASE_URL'],
    supabaseAnonKey: env['SUPABASE_ANON_KEY'],
    supabaseServiceKey: env['SUPABASE_SERVICE_KEY'],
    allowedOrigins: env['ALLOWED_ORIGINS'],
    logLevel: env['LOG_LEVEL'],
    admin: {
      username: env['ADMIN_USERNAME'],
      email: env['ADMIN_EMAIL'],
      password: emptyToUndefined(env['ADMIN_PASSWORD']),
    },
  });
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}
