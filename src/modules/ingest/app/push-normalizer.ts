import { createNormalizedEvent } from '@/modules/events/app/normalized-event.factory';
import type { NormalizedEvent } from '@/modules/events/domain/entity/normalized-event.entity';
import { EventOrigins } from '@/modules/events/domain/event.enums';
import { parseOccurredAt } from './occurred-at';

const UNKNOWN_TITLE = 'Unknown Incident';
const UNKNOWN_STATUS = 'Unknown';

type PayloadRecord = Record<string, unknown>;

/**
 * Known push payload layouts, resolved once per payload:
 * - `incident-envelope`: `{ event_type, data: { incident: {...} } }` (incident.io)
 * - `data-envelope`: `{ event_type, data: {...} }`
 * - `bare`: the incident record is the payload itself
 */
export type PushPayloadShape =
  | { kind: 'incident-envelope'; envelope: PayloadRecord; incident: PayloadRecord }
  | { kind: 'data-envelope'; envelope: PayloadRecord; incident: PayloadRecord }
  | { kind: 'bare'; envelope: PayloadRecord; incident: PayloadRecord };

export function resolvePushShape(payload: unknown): PushPayloadShape {
  const envelope = isRecord(payload) ? payload : {};
  const data = envelope.data;

  if (isRecord(data)) {
    const incident = data.incident;
    if (isRecord(incident)) {
      return { kind: 'incident-envelope', envelope, incident };
    }
    return { kind: 'data-envelope', envelope, incident: data };
  }

  return { kind: 'bare', envelope, incident: envelope };
}

export function normalizePushPayload(payload: unknown, sourceName: string, ingestedAt = new Date()): NormalizedEvent {
  const { envelope, incident } = resolvePushShape(payload);
  const occurredAt = parseOccurredAt(incident.created_at ?? envelope.created_at, ingestedAt);

  return createNormalizedEvent({
    id: readIdentity(incident.id),
    sourceName,
    origin: EventOrigins.Push,
    eventKind: readString(envelope, 'event_type') ?? '',
    title: readString(incident, 'name', 'title') ?? UNKNOWN_TITLE,
    status: unwrapLabel(incident.status) ?? UNKNOWN_STATUS,
    severity: unwrapLabel(incident.severity) ?? '',
    description: readString(incident, 'summary', 'description') ?? '',
    affectedComponents: readComponents(incident.affected_components),
    link: readString(incident, 'permalink', 'url') ?? '',
    occurredAt: occurredAt.value.toISOString(),
    occurredAtEstimated: occurredAt.kind === 'fallback',
  });
}

const isRecord = (value: unknown): value is PayloadRecord => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const readIdentity = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
};

const readString = (record: PayloadRecord, ...keys: string[]): string | null => {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return null;
};

// Status and severity arrive either as a plain string or as `{ label: "..." }`.
const unwrapLabel = (value: unknown): string | null => {
  if (typeof value === 'string') {
    return value.length > 0 ? value : null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isRecord(value)) {
    return readString(value, 'label');
  }
  return null;
};

const readComponents = (value: unknown): string[] => {
  if (!Array.isArray(value)) {
    return [];
  }

  const components: string[] = [];
  for (const item of value) {
    const name = isRecord(item) ? (readString(item, 'name') ?? JSON.stringify(item)) : String(item);
    if (name.length > 0) {
      components.push(name);
    }
  }
  return components;
};
