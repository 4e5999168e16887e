import { z } from '@hono/zod-openapi';

export const schemaPostWebhookParams = z.object({
  provider: z
    .string()
    .min(1)
    .openapi({ param: { name: 'provider', in: 'path' }, example: 'statuspage' }),
});

export const schemaPostWebhookResBody = z.object({
  status: z.literal('received'),
  timestamp: z.string().describe('ISO-8601'),
});

export const schemaWebhookErrorResBody = z.object({
  error: z.string(),
});

export type PostWebhookResBodyDto = z.infer<typeof schemaPostWebhookResBody>;
