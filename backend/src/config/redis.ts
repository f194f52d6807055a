import { createClient } from 'redis';
import { storageConfig } from './services';

export type RedisClient = ReturnType<typeof createClient>;

let redisClient: RedisClient | null = null;

/** Holds the active-session claims; sessions themselves live in MongoDB. */
export const connectRedis = async (): Promise<RedisClient> => {
  const { host, port, password } = storageConfig.redis;
  try {
    redisClient = createClient({ socket: { host, port }, password });
    redisClient.on('error', (err) => console.error('Redis Client Error', err));

    await redisClient.connect();
    console.log(`✓ Redis connected (${host}:${port})`);
    return redisClient;
  } catch (error) {
    console.error('Failed to connect to Redis:', error);
    throw error;
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};
