import type { Redis } from 'ioredis';
import type { EventDto } from '@/modules/events/domain/dto/event.dto';

export const INCIDENTS_CHANNEL = 'incidents:new';

export async function publishIncident(redis: Pick<Redis, 'publish'>, event: EventDto): Promise<number> {
  return redis.publish(INCIDENTS_CHANNEL, JSON.stringify(event));
}
