export type OccurredAtResult = { kind: 'parsed'; value: Date } | { kind: 'fallback'; value: Date };

/**
 * Best-effort timestamp parsing. Anything that is not a parseable date string resolves
 * to the ingestion time, tagged as a fallback.
 */
export function parseOccurredAt(raw: unknown, ingestedAt: Date): OccurredAtResult {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return { kind: 'fallback', value: ingestedAt };
  }

  const parsed = new Date(raw.trim());
  if (Number.isNaN(parsed.getTime())) {
    return { kind: 'fallback', value: ingestedAt };
  }

  return { kind: 'parsed', value: parsed };
}
