import { Redis } from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';
import { REDIS_URL, CACHE_TTL_SECONDS, CACHE_KEY_PREFIX } from '../config/constants.js';
import type { CurrencyCode, DateRange } from '../types/index.js';

interface MemoryEntry {
  value: string;
  insertedAt: number;
}

export interface CacheOptions {
  redisUrl?: string;
  ttlSeconds?: number;
  now?: () => number;
}

class CacheService {
  private client: Redis | null;
  private memory = new Map<string, MemoryEntry>();
  private logger: FastifyBaseLogger;
  private ttlSeconds: number;
  private now: () => number;

  constructor(logger: FastifyBaseLogger, options: CacheOptions = {}) {
    this.logger = logger;
    this.ttlSeconds = options.ttlSeconds ?? CACHE_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    const redisUrl = options.redisUrl ?? REDIS_URL;

    if (!redisUrl) {
      this.logger.info(`Redis disabled (REDIS_URL not set) - using in-memory cache, TTL ${this.ttlSeconds}s`);
      this.client = null;
      return;
    }

    this.client = new Redis(redisUrl, {
      retryStrategy(times) {
        if (times > 3) return null;
        return Math.min(times * 50, 2000);
      },
      maxRetriesPerRequest: 3,
      lazyConnect: true
    });

    this.client.on('connect', () => {
      this.logger.info('Redis connected');
    });

    this.client.on('error', (err) => {
      this.logger.warn({ err }, 'Redis connection error - lookups will miss');
    });

    this.client.connect().catch((err: unknown) => {
      this.logger.warn({ err }, 'Redis unavailable - falling back to in-memory cache');
      this.client = null;
    });
  }

  getTimeframeKey(base: CurrencyCode, targets: CurrencyCode[], range: DateRange): string {
    return `${CACHE_KEY_PREFIX}timeframe:${base}:${[...targets].sort().join(',')}:${range.start}:${range.end}`;
  }

  // Parsed JSON, or undefined on a miss; callers check the shape
  async get(key: string): Promise<unknown> {
    const raw = this.client ? await this.getFromRedis(key) : this.getFromMemory(key);
    if (raw === null) return undefined;

    try {
      const parsed: unknown = JSON.parse(raw);
      this.logger.info(`Cache HIT: ${key}`);
      return parsed;
    } catch (err) {
      this.logger.warn({ err }, `Unreadable cache entry: ${key}`);
      return undefined;
    }
  }

  async set(key: string, data: unknown): Promise<void> {
    const raw = JSON.stringify(data);

    if (!this.client) {
      this.memory.set(key, { value: raw, insertedAt: this.now() });
      this.logger.info(`Cache SET: ${key} (TTL: ${this.ttlSeconds}s, memory)`);
      return;
    }

    try {
      await this.client.setex(key, this.ttlSeconds, raw);
      this.logger.info(`Cache SET: ${key} (TTL: ${this.ttlSeconds}s)`);
    } catch (err) {
      this.logger.warn({ err }, 'Redis SET error');
    }
  }

  async ping(): Promise<void> {
    if (!this.client) return;
    await this.client.ping();
  }

  async keys(pattern: string): Promise<string[]> {
    if (this.client) {
      return await this.client.keys(pattern);
    }

    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    return [...this.memory.keys()].filter(key =>
      (pattern.endsWith('*') ? key.startsWith(prefix) : key === pattern) && this.getFromMemory(key) !== null
    );
  }

  getBackend(): 'redis' | 'memory' {
    return this.client ? 'redis' : 'memory';
  }

  async close(): Promise<void> {
    this.memory.clear();
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  private async getFromRedis(key: string): Promise<string | null> {
    if (!this.client) return null;

    try {
      return await this.client.get(key);
    } catch (err) {
      this.logger.warn({ err }, 'Redis GET error');
      return null;
    }
  }

  private getFromMemory(key: string): string | null {
    const entry = this.memory.get(key);
    if (!entry) return null;

    if (this.now() - entry.insertedAt >= this.ttlSeconds * 1000) {
      this.memory.delete(key);
      return null;
    }
    return entry.value;
  }
}

export default CacheService;
