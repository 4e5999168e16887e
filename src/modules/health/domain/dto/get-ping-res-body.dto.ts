import { z } from '@hono/zod-openapi';

export const schemaGetPingResBody = z.object({
  ok: z.boolean().openapi({ example: true }),
  uptimeSec: z.number().int().describe('Seconds since process start'),
  timestamp: z.number().describe('Timestamp(ms)'),
});

export type GetPingResBodyDto = z.infer<typeof schemaGetPingResBody>;
