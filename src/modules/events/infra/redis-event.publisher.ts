import type { Redis } from 'ioredis';
import { publishIncident } from '@/infra/redis/pubsub';
import type { EventDto } from '../domain/dto/event.dto';
import type { IEventPublisher } from '../domain/port/event-publisher.interface';

export class RedisEventPublisher implements IEventPublisher {
  public readonly name = 'redis';

  constructor(private readonly redis: Pick<Redis, 'publish'>) {}

  public async publish(event: EventDto): Promise<void> {
    await publishIncident(this.redis, event);
  }
}
