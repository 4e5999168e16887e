import type { NormalizedEvent } from '../domain/entity/normalized-event.entity';
import { NormalizationError } from '../domain/event.errors';

export function createNormalizedEvent(fields: NormalizedEvent): NormalizedEvent {
  const id = fields.id.trim();
  if (!id) {
    throw new NormalizationError('Event has no identity', {
      origin: fields.origin,
      sourceName: fields.sourceName,
      title: fields.title,
    });
  }

  return Object.freeze({
    ...fields,
    id,
    affectedComponents: Object.freeze([...fields.affectedComponents]),
  });
}
