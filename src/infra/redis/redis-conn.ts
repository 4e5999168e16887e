import IORedis, { type Redis } from 'ioredis';
import type { DependencyContainer } from '@/core/dep';
import { env } from '@/core/env';
import { RedisDeps } from './redis.dep';

function createRedisClient(url: string): Redis {
  return new IORedis(url, { lazyConnect: true, maxRetriesPerRequest: 3 });
}

export function registerRedisDeps(dep: DependencyContainer): boolean {
  const url = env.REDIS_URL;
  if (!url) {
    return false;
  }

  dep.addDynamic(RedisDeps.Client, () => createRedisClient(url));
  return true;
}
