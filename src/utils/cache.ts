import redisClient from "../config/redis";

export const CACHE_TTL = {
  SHORT: 300, // 5 minutes (case listing)
};

export class CacheService {
  private static isRedisReady(): boolean {
    return redisClient.isOpen && redisClient.isReady;
  }

  static async get(key: string): Promise<unknown> {
    if (!this.isRedisReady()) return null;
    try {
      const data = await redisClient.get(key);
      return data ? JSON.parse(data) : null;
    } catch (error) {
      console.error(`Cache Get Error [${key}]:`, error);
      return null;
    }
  }

  static async set(key: string, value: unknown, ttl: number = CACHE_TTL.SHORT): Promise<void> {
    if (!this.isRedisReady()) return;
    try {
      await redisClient.set(key, JSON.stringify(value), { EX: ttl });
    } catch (error) {
      console.error(`Cache Set Error [${key}]:`, error);
    }
  }
}
