import type { EventDto } from '../dto/event.dto';

export interface IEventPublisher {
  readonly name: string;
  publish(event: EventDto): Promise<void>;
}
