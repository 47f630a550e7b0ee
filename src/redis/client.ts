/**
 * Redis Connection for the Learned-Mapping Store
 *
 * Only MAPPING_STORE=redis ever opens this connection. It is created on the
 * first mapping lookup and never throws: while Redis is down every read
 * returns its fallback and the store treats the line as unmapped.
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../config';
import { componentLogger } from '../utils';
import { describeError } from '../utils/errors';

const logger = componentLogger('mappings');

const MAX_RECONNECT_ATTEMPTS = 3;
const RECONNECT_STEP_MS = 100;

function connectionOptions(): RedisOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    db: env.REDIS_DB,
    ...(env.REDIS_PASSWORD ? { password: env.REDIS_PASSWORD } : {}),
    // A mapping lookup must not hold up an upload
    maxRetriesPerRequest: 1,
    // 100ms, 200ms, 300ms, then give up
    retryStrategy: (attempt: number) =>
      attempt > MAX_RECONNECT_ATTEMPTS ? null : attempt * RECONNECT_STEP_MS,
    lazyConnect: true,
  };
}

interface ConnectionState {
  client: Redis | null;
  connected: boolean;
}

const state: ConnectionState = { client: null, connected: false };

function openConnection(): Redis {
  const client = new Redis(connectionOptions());

  const markDown = (reason: string) => () => {
    state.connected = false;
    logger.debug(`Mapping store Redis ${reason}`);
  };

  client.on('connect', () => {
    state.connected = true;
    logger.info(`📦 Mapping store connected to Redis at ${env.REDIS_HOST}:${env.REDIS_PORT}`);
  });
  client.on('ready', () => {
    state.connected = true;
  });
  client.on('error', (error: Error) => {
    state.connected = false;
    logger.warn(`Mapping store Redis error (non-fatal): ${error.message}`);
  });
  client.on('close', markDown('connection closed'));
  client.on('end', markDown('connection ended'));

  client.connect().catch((error: unknown) => {
    state.connected = false;
    logger.warn(`Mapping store could not reach Redis (non-fatal): ${describeError(error)}`);
  });

  return client;
}

/**
 * Returns the shared connection, opening it on first use
 */
export function getRedisClient(): Redis {
  if (state.client === null) {
    state.client = openConnection();
  }
  return state.client;
}

export function isRedisAvailable(): boolean {
  return state.client !== null && state.connected;
}

/**
 * Closes the connection during shutdown; a later lookup opens a new one
 */
export async function disconnectRedis(): Promise<void> {
  const { client } = state;
  if (client === null) {
    return;
  }

  state.client = null;
  state.connected = false;

  try {
    await client.quit();
    logger.info('Mapping store disconnected from Redis');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${describeError(error)}`);
  }
}

/**
 * Runs a read against Redis, answering `fallback` when Redis is down or the
 * command fails
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  label = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!state.connected) {
    logger.debug(`${label}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${label} failed (non-fatal): ${describeError(error)}`);
    return fallback;
  }
}

/**
 * Fire-and-forget variant for deletes and other writes nobody waits on
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  label = 'Redis write'
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
      return undefined;
    },
    undefined,
    label
  );
}
