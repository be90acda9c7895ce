import { Redis } from 'ioredis';

/**
 * Creates the long-lived producer connection.
 *
 * `lazyConnect` lets the caller await `connect()` at startup; a server
 * that is unreachable then rejects that first connect.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
