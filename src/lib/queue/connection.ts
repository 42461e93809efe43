/**
 * Shared BullMQ connection config for queues and workers.
 * Includes a Redis health check so callers can fall back to inline execution.
 */

import Redis, { type RedisOptions } from 'ioredis';
import { loadConfig } from '../config';

export function redisOptionsFromUrl(url: string): RedisOptions {
  const parsed = new URL(url);
  const db = Number(parsed.pathname.replace('/', ''));

  return {
    host: parsed.hostname || 'localhost',
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isInteger(db) ? db : 0,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    // BullMQ workers block on Redis and require this to be null
    maxRetriesPerRequest: null,
  };
}

export function getRedisConnection(): RedisOptions {
  return redisOptionsFromUrl(loadConfig().redisUrl);
}

/**
 * Check whether Redis is reachable.
 * Returns true if a PING succeeds within 3 seconds, false otherwise.
 */
export async function checkRedisHealth(url = loadConfig().redisUrl): Promise<boolean> {
  const client = new Redis(url, {
    connectTimeout: 3000,
    maxRetriesPerRequest: 0,
    lazyConnect: true,
  });

  try {
    await client.connect();
    const pong = await client.ping();
    return pong === 'PONG';
  } catch (error) {
    console.warn('[Queue] Redis unreachable:', error instanceof Error ? error.message : error);
    return false;
  } finally {
    client.disconnect();
  }
}
