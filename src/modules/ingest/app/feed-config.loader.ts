import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { logger } from '@/core/logger';
import { schemaFeedList } from '../domain/dto/feed-config.dto';
import type { FeedConfig } from '../domain/entity/feed.entity';

/**
 * Reads the ordered `{ name, url }` feed list. A missing file means no feeds; an invalid
 * file throws.
 */
export function loadFeedConfigs(configPath: string): FeedConfig[] {
  const filePath = resolve(process.cwd(), configPath);
  if (!existsSync(filePath)) {
    logger.warn({ filePath }, 'Feed config not found, polling no feeds');
    return [];
  }

  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return schemaFeedList.parse(parsed);
}
