import { z } from '@hono/zod-openapi';
import { EventOrigins } from '../event.enums';

export const schemaEvent = z.object({
  id: z.string().openapi({ example: '01HZX3K9' }),
  sourceName: z.string().openapi({ example: 'incident.io' }),
  origin: z.enum(EventOrigins),
  eventKind: z.string(),
  title: z.string(),
  status: z.string().openapi({ example: 'Investigating' }),
  severity: z.string(),
  description: z.string(),
  affectedComponents: z.array(z.string()),
  link: z.string(),
  occurredAt: z.string().describe('ISO-8601'),
  occurredAtEstimated: z.boolean(),
});

export type EventDto = z.infer<typeof schemaEvent>;
