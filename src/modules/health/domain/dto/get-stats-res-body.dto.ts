import { z } from '@hono/zod-openapi';

export const schemaGetStatsResBody = z.object({
  seenIncidentsCount: z.number().int().describe('Distinct identities marked seen since startup'),
  pendingPushJobs: z.number().int(),
  pollerRunning: z.boolean(),
  streamClients: z.number().int().describe('Connected SSE clients'),
  timestamp: z.string().describe('ISO-8601'),
});

export type GetStatsResBodyDto = z.infer<typeof schemaGetStatsResBody>;
