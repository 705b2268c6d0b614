/**
 * Validates environment variables at boot.
 * Fails fast with the list of problems if any are missing or invalid.
 */

import { z } from 'zod';

const envSchema = z.object({
  // Server
  PORT: z.string().regex(/^\d+$/, 'PORT must be a number').transform(Number).optional(),
  CLIENT_ORIGIN: z.string().optional(),

  // Redis (card UID map). Optional: the map falls back to memory.
  REDIS_URL: z.string().url('REDIS_URL must be a valid Redis connection string').optional(),

  // Host tokens
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),

  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface ServerConfig {
  port: number;
  clientOrigin: string;
  redisUrl: string | undefined;
}

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

/** Typed config from process.env, or exit(1) after printing every issue. */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = parseEnv(source);

  if (!result.success) {
    console.error('[config] environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export function toServerConfig(env: Env): ServerConfig {
  return {
    port: env.PORT ?? 4000,
    clientOrigin: env.CLIENT_ORIGIN ?? '*',
    redisUrl: env.REDIS_URL,
  };
}

export function logEnvSummary(env: Env): void {
  console.log('[config] environment validated:');
  console.log(`  NODE_ENV: ${env.NODE_ENV ?? 'development'}`);
  console.log(`  PORT: ${env.PORT ?? 4000}`);
  console.log(`  REDIS_URL: ${env.REDIS_URL ? maskConnectionString(env.REDIS_URL) : '[memory]'}`);
  console.log(`  JWT_SECRET: [SET]`);
  console.log(`  CLIENT_ORIGIN: ${env.CLIENT_ORIGIN ?? '*'}`);
}

function maskConnectionString(url: string): string {
  try {
    const u = new URL(url);
    if (u.password) u.password = '***';
    return u.toString();
  } catch {
    return '[INVALID_URL]';
  }
}
