import type { EventOrigins } from '../event.enums';

export type NormalizedEvent = Readonly<{
  id: string;
  sourceName: string;
  origin: EventOrigins;
  eventKind: string;
  title: string;
  status: string;
  severity: string;
  description: string;
  affectedComponents: readonly string[];
  link: string;
  occurredAt: string;
  // true when occurredAt is the ingestion time rather than a provider timestamp
  occurredAtEstimated: boolean;
}>;
