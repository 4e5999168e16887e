import { describe, expect, it } from 'vitest';
import { EventOrigins } from '@/modules/events/domain/event.enums';
import { NormalizationError } from '@/modules/events/domain/event.errors';
import { normalizePushPayload, resolvePushShape } from './push-normalizer';

const INGESTED_AT = new Date('2024-05-06T09:30:00.000Z');

describe('resolvePushShape', () => {
  it('should resolve each known layout', () => {
    expect(resolvePushShape({ data: { incident: { id: 'a' } } }).kind).toBe('incident-envelope');
    expect(resolvePushShape({ data: { id: 'a' } }).kind).toBe('data-envelope');
    expect(resolvePushShape({ id: 'a' }).kind).toBe('bare');
  });

  it('should treat non-record payloads as an empty bare record', () => {
    expect(resolvePushShape(['a'])).toEqual({ kind: 'bare', envelope: {}, incident: {} });
    expect(resolvePushShape('text')).toEqual({ kind: 'bare', envelope: {}, incident: {} });
  });

  it('should fall back to the data record when data.incident is not a record', () => {
    const shape = resolvePushShape({ data: { id: 'a', incident: 'x' } });
    expect(shape.kind).toBe('data-envelope');
    expect(shape.incident).toEqual({ id: 'a', incident: 'x' });
  });
});

describe('normalizePushPayload', () => {
  it('should normalize an incident.io envelope', () => {
    const payload = {
      data: {
        incident: {
          id: 'abc',
          name: 'API errors',
          status: { label: 'Investigating' },
          affected_components: [{ name: 'API' }],
        },
      },
    };

    expect(normalizePushPayload(payload, 'incident.io', INGESTED_AT)).toEqual({
      id: 'abc',
      sourceName: 'incident.io',
      origin: EventOrigins.Push,
      eventKind: '',
      title: 'API errors',
      status: 'Investigating',
      severity: '',
      description: '',
      affectedComponents: ['API'],
      link: '',
      occurredAt: '2024-05-06T09:30:00.000Z',
      occurredAtEstimated: true,
    });
  });

  it('should read every field from a bare record', () => {
    const event = normalizePushPayload(
      {
        event_type: 'incident.updated',
        id: 'inc-9',
        title: 'Slow dashboard',
        status: 'monitoring',
        severity: { label: 'Minor' },
        summary: 'Latency is elevated',
        url: 'https://status.example.com/inc-9',
        created_at: '2024-05-01T10:00:00Z',
      },
      'statuspage',
      INGESTED_AT,
    );

    expect(event.eventKind).toBe('incident.updated');
    expect(event.title).toBe('Slow dashboard');
    expect(event.status).toBe('monitoring');
    expect(event.severity).toBe('Minor');
    expect(event.description).toBe('Latency is elevated');
    expect(event.link).toBe('https://status.example.com/inc-9');
    expect(event.occurredAt).toBe('2024-05-01T10:00:00.000Z');
    expect(event.occurredAtEstimated).toBe(false);
  });

  it('should prefer name over title and permalink over url', () => {
    const event = normalizePushPayload(
      { data: { id: '1', name: 'Name', title: 'Title', permalink: 'https://p', url: 'https://u' } },
      'generic',
      INGESTED_AT,
    );

    expect(event.title).toBe('Name');
    expect(event.link).toBe('https://p');
  });

  it('should use the envelope created_at when the incident has none', () => {
    const event = normalizePushPayload(
      { created_at: '2024-04-30T23:00:00+02:00', data: { incident: { id: 'x' } } },
      'incident.io',
      INGESTED_AT,
    );

    expect(event.occurredAt).toBe('2024-04-30T21:00:00.000Z');
    expect(event.occurredAtEstimated).toBe(false);
  });

  it('should fall back to ingestion time for an unparseable created_at', () => {
    const event = normalizePushPayload({ id: 'x', created_at: 'sometime' }, 'generic', INGESTED_AT);

    expect(event.occurredAt).toBe('2024-05-06T09:30:00.000Z');
    expect(event.occurredAtEstimated).toBe(true);
  });

  it('should apply defaults for a minimal payload', () => {
    const event = normalizePushPayload({ id: 'x', status: { code: 3 } }, 'generic', INGESTED_AT);

    expect(event.title).toBe('Unknown Incident');
    expect(event.status).toBe('Unknown');
    expect(event.severity).toBe('');
    expect(event.affectedComponents).toEqual([]);
  });

  it('should render numeric ids and non-record components as strings', () => {
    const event = normalizePushPayload(
      { id: 42, affected_components: ['Search', { id: 7 }, { name: 'Billing' }] },
      'generic',
      INGESTED_AT,
    );

    expect(event.id).toBe('42');
    expect(event.affectedComponents).toEqual(['Search', '{"id":7}', 'Billing']);
  });

  it('should fail construction when the payload has no identity', () => {
    let thrown: unknown;
    try {
      normalizePushPayload({ data: { incident: { name: 'No id here' } } }, 'incident.io', INGESTED_AT);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(NormalizationError);
    if (thrown instanceof NormalizationError) {
      expect(thrown.context).toEqual({ origin: EventOrigins.Push, sourceName: 'incident.io', title: 'No id here' });
    }
  });

  it('should return a frozen event', () => {
    const event = normalizePushPayload({ id: 'x', affected_components: ['API'] }, 'generic', INGESTED_AT);

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.affectedComponents)).toBe(true);
  });
});
