import type { NormalizedEvent } from '../entity/normalized-event.entity';

/**
 * Downstream consumer of newly seen events. Called at most once per identity.
 */
export interface IEventSink {
  emit(event: NormalizedEvent): Promise<void>;
}
