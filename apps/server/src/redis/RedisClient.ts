/**
 * RedisClient – optional connection wrapper.
 *
 * Without REDIS_URL there is no client and CardMapStore keeps the card map in
 * process memory instead. Nothing else in the server talks to Redis.
 *
 * Usage:
 *   REDIS_URL=redis://localhost:6379  npm run dev
 */

import Redis from 'ioredis';

// ─────────────────────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────────────────────

let _redis: Redis | null = null;

export function getRedis(): Redis | null {
  return _redis;
}

/**
 * Call once at server startup.
 * Resolves true once connected, false if Redis is not configured or not reachable.
 */
export async function initRedis(url: string | undefined): Promise<boolean> {
  if (!url) {
    console.log('[redis] REDIS_URL not set – card map kept in memory');
    return false;
  }

  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
  client.on('error', err => console.warn('[redis] client error:', err.message));

  try {
    await client.connect();
    await client.ping();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn('[redis] connection failed – card map kept in memory:', message);
    client.disconnect();
    return false;
  }

  _redis = client;
  console.log(`[redis] connected to ${url}`);
  return true;
}

export async function closeRedis(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
  }
}
