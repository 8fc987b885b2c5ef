import Redis from 'ioredis';
import { createLogger } from '@/lib/logger';

const log = createLogger('Redis');

type RedisGlobal = {
  redis: Redis | null | undefined;
  redisListenersRegistered?: boolean;
  redisCleanupRegistered?: boolean;
  redisDisabledLogged?: boolean;
};

const globalForRedis = globalThis as unknown as RedisGlobal;

const sharedOptions = {
  tls: process.env.REDIS_TLS_ENABLED === 'true' ? {} : undefined,
  maxRetriesPerRequest: 3,
  retryStrategy(times: number) {
    return Math.min(times * 50, 2000);
  },
  reconnectOnError(err: Error) {
    const targetErrors = ['READONLY', 'ECONNRESET'];
    return targetErrors.some((code) => err.message.includes(code));
  },
  lazyConnect: true, // Don't connect until the first command
  enableReadyCheck: true,
  showFriendlyErrorStack: process.env.NODE_ENV === 'development',
};

function createRedisClient(): Redis | null {
  if (process.env.REDIS_URL) {
    return new Redis(process.env.REDIS_URL, sharedOptions);
  }

  if (process.env.REDIS_HOST && process.env.REDIS_PORT) {
    return new Redis({
      ...sharedOptions,
      host: process.env.REDIS_HOST,
      port: parseInt(process.env.REDIS_PORT || '6379', 10),
      password: process.env.REDIS_PASSWORD,
    });
  }

  if (!globalForRedis.redisDisabledLogged && process.env.NODE_ENV !== 'test') {
    log.info(
      'Redis is not configured (set REDIS_URL or REDIS_HOST/REDIS_PORT). Identity cache stays in memory.'
    );
    globalForRedis.redisDisabledLogged = true;
  }

  return null;
}

function registerLifecycle(client: Redis) {
  if (!globalForRedis.redisListenersRegistered) {
    client.on('ready', () => {
      log.info('Redis client ready');
    });

    client.on('error', (err) => {
      log.error({ error: err.message }, 'Redis error');
    });

    client.on('close', () => {
      log.warn('Redis connection closed');
    });

    client.on('reconnecting', () => {
      log.info('Reconnecting to Redis...');
    });

    globalForRedis.redisListenersRegistered = true;
  }

  if (!globalForRedis.redisCleanupRegistered) {
    process.on('SIGTERM', async () => {
      log.info('SIGTERM received, closing Redis connection');
      try {
        await client.quit();
      } catch (error) {
        log.error({ error }, 'Error closing Redis connection on SIGTERM');
      }
    });

    globalForRedis.redisCleanupRegistered = true;
  }
}

/**
 * Shared Redis client, or null when Redis is not configured
 */
export function getRedisClient(): Redis | null {
  if (globalForRedis.redis !== undefined) return globalForRedis.redis;

  const client = createRedisClient();
  if (client) registerLifecycle(client);
  globalForRedis.redis = client;
  return client;
}
