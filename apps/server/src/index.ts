import { createApp } from './app';
import { closeRedis } from './redis/RedisClient';
import { logEnvSummary, toServerConfig, validateEnv } from './config/env';

// ─────────────────────────────────────────────────────────────────────────────
// Boot sequence  (async so Redis init can complete before routes take traffic)
// ─────────────────────────────────────────────────────────────────────────────

async function boot(): Promise<void> {
  // 1. Config: exits with the list of problems if anything is wrong
  const env = validateEnv();
  logEnvSummary(env);
  const config = toServerConfig(env);

  // 2. App: Redis is optional; the card map falls back to memory
  const { httpServer } = await createApp({
    redisUrl: config.redisUrl,
    corsOrigin: config.clientOrigin,
  });

  // 3. HTTP + socket server
  httpServer.listen(config.port, () => {
    console.log(`[server] feltcast listening on port ${config.port}`);
  });
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[server] ${signal} received — shutting down`);
  await closeRedis();
  process.exit(0);
}

// Graceful shutdown
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(err => {
      console.error('[server] shutdown failed:', err);
      process.exit(1);
    });
  });
}

boot().catch(err => {
  console.error('[server] boot failed:', err);
  process.exit(1);
});
