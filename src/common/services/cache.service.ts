import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

@Injectable()
export class CacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CacheService.name);
  private readonly client: Redis;
  private readonly prefix: string;

  constructor(private configService: ConfigService) {
    const host = this.configService.get<string>('redis.host') || 'localhost';
    const port = this.configService.get<number>('redis.port') || 6379;
    const password = this.configService.get<string>('redis.password') || undefined;
    this.prefix = this.configService.get<string>('cache.prefix') || 'fmg:';

    this.client = new Redis({
      host,
      port,
      password,
      lazyConnect: true,
      retryStrategy: (times) => Math.min(times * 100, 3000),
      maxRetriesPerRequest: 3,
    });

    this.client.on('connect', () => {
      this.logger.log('Connected to Redis');
    });

    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis error: ${error.message}`);
    });
  }

  async onModuleInit() {
    await this.client.connect();
  }

  async onModuleDestroy() {
    await this.client.quit();
  }

  async get<T>(key: string): Promise<T | null> {
    const value = await this.client.get(this.prefix + key);
    if (value === null) return null;

    return JSON.parse(value) as T;
  }

  async set(key: string, value: unknown, ttlSeconds: number = 3600): Promise<void> {
    await this.client.setex(this.prefix + key, ttlSeconds, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.prefix + key);
  }

  /** Keys matching `pattern`, returned without the namespace prefix. */
  async keys(pattern: string): Promise<string[]> {
    const keys = await this.client.keys(this.prefix + pattern);
    return keys.map(key => key.slice(this.prefix.length));
  }

  async deletePattern(pattern: string): Promise<number> {
    const keys = await this.client.keys(this.prefix + pattern);
    if (keys.length === 0) return 0;
    return this.client.del(...keys);
  }
}
