import type { EventDto } from '../domain/dto/event.dto';
import type { NormalizedEvent } from '../domain/entity/normalized-event.entity';

export function toEventDto(event: NormalizedEvent): EventDto {
  return {
    id: event.id,
    sourceName: event.sourceName,
    origin: event.origin,
    eventKind: event.eventKind,
    title: event.title,
    status: event.status,
    severity: event.severity,
    description: event.description,
    affectedComponents: [...event.affectedComponents],
    link: event.link,
    occurredAt: event.occurredAt,
    occurredAtEstimated: event.occurredAtEstimated,
  };
}

/**
 * Single-line summary used for the emission log.
 */
export function formatEventSummary(event: NormalizedEvent): string {
  const components = event.affectedComponents.length > 0 ? event.affectedComponents.join(', ') : 'General';
  const parts = [`[${event.occurredAt}]`, `Provider: ${event.sourceName}`, `Product: ${components}`];
  parts.push(`Status: ${event.status} - ${event.title}`);

  if (event.eventKind) {
    parts.push(`Event: ${event.eventKind}`);
  }
  if (event.link) {
    parts.push(`Link: ${event.link}`);
  }

  return parts.join(' | ');
}
