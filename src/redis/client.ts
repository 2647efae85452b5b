/**
 * Redis Client
 *
 * Shared connection for the background job store (progress hashes and
 * finished cleaning logs).
 *
 * Only CSV uploads depend on it. While Redis is down, reads return their
 * fallback, writes are skipped and uploads are refused; synchronous
 * reconciliation carries on.
 */

import Redis, { type RedisOptions } from 'ioredis';
import { env } from '../config';
import { errorMessage, logger } from '../utils';

/** Reconnect attempts before the client gives up until the next restart */
const MAX_RECONNECT_ATTEMPTS = 10;

export function createRedisOptions(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // Fail a command fast rather than queue it behind a dead connection
    maxRetriesPerRequest: 1,
    // 200ms, 400ms, ... then stop reconnecting
    retryStrategy: (times) => (times > MAX_RECONNECT_ATTEMPTS ? null : times * 200),
    lazyConnect: true,
  };
}

let redisClient: Redis | null = null;
let isConnected = false;

function createRedisClient(): Redis {
  const client = new Redis(createRedisOptions());

  client.on('ready', () => {
    isConnected = true;
    logger.info(`📦 Job store connected (${env.REDIS_HOST}:${env.REDIS_PORT})`);
  });

  client.on('error', (error: Error) => {
    isConnected = false;
    logger.warn(`Job store error: ${error.message}`);
  });

  client.on('end', () => {
    isConnected = false;
    logger.warn('Job store connection closed; uploads are disabled');
  });

  client.connect().catch((error: unknown) => {
    isConnected = false;
    logger.warn(`Job store unreachable: ${errorMessage(error)}`);
  });

  return client;
}

/**
 * The shared client, created (and connecting) on first use.
 */
export function getRedisClient(): Redis {
  if (!redisClient) {
    redisClient = createRedisClient();
  }
  return redisClient;
}

export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

export async function disconnectRedis(): Promise<void> {
  if (!redisClient) {
    return;
  }

  const client = redisClient;
  redisClient = null;
  isConnected = false;

  try {
    await client.quit();
    logger.info('Job store disconnected');
  } catch (error) {
    logger.warn(`Job store disconnect failed: ${errorMessage(error)}`);
  }
}

/**
 * Runs a read against the job store, answering `fallback` when Redis is
 * down or the command fails.
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName: string
): Promise<T> {
  const client = getRedisClient();
  if (!isConnected) {
    logger.debug(`${operationName}: job store unavailable`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed: ${errorMessage(error)}`);
    return fallback;
  }
}

/**
 * Runs a write against the job store; failures are logged and dropped.
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName: string
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
    },
    undefined,
    operationName
  );
}
