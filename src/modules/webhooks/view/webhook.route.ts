import { createRoute, OpenAPIHono } from '@hono/zod-openapi';
import type { Context } from 'hono';
import { inject, injectable } from 'inversify';
import { logger } from '@/core/logger';
import { IngestFailures } from '@/modules/ingest/domain/ingest.enums';
import type { IRoute } from '@/view/route.interface';
import { readPushSignature } from '../app/signature-verifier';
import type { PushQueueService } from '../app/push-queue.service';
import { WebhookDeps } from '../domain/dep/webhook.dep';
import {
  type PostWebhookResBodyDto,
  schemaPostWebhookParams,
  schemaPostWebhookResBody,
  schemaWebhookErrorResBody,
} from '../domain/dto/post-webhook.dto';
import { WebhookEndpoints } from '../domain/webhook.enums';

export const INCIDENT_IO_PROVIDER = 'incident.io';

type ParsedBody = { ok: true; rawBody: Buffer; payload: unknown } | { ok: false; message: string };

const responses = {
  200: {
    content: { 'application/json': { schema: schemaPostWebhookResBody } },
    description: 'Accepted for asynchronous processing',
  },
  400: {
    content: { 'application/json': { schema: schemaWebhookErrorResBody } },
    description: 'Body is not valid JSON',
  },
};

@injectable()
export class WebhookRoute implements IRoute {
  constructor(
    @inject(WebhookDeps.PushQueueService)
    pushQueue: PushQueueService,
  ) {
    const accept = (c: Context, endpoint: WebhookEndpoints, provider: string, body: { rawBody: Buffer; payload: unknown }) => {
      pushQueue.enqueue({
        endpoint,
        provider,
        rawBody: body.rawBody,
        payload: body.payload,
        signature: readPushSignature(endpoint, (name) => c.req.header(name)),
        receivedAt: new Date().toISOString(),
      });
      const ack: PostWebhookResBodyDto = { status: 'received', timestamp: new Date().toISOString() };
      return ack;
    };

    this.app.openapi(
      createRoute({
        tags: ['Webhooks'],
        method: 'post',
        path: '/incident-io',
        summary: 'Receive an incident.io webhook',
        description: 'Signed with webhook-id / webhook-timestamp / webhook-signature headers.',
        responses,
      }),
      async (c) => {
        const body = await readJsonBody(c);
        if (!body.ok) {
          return c.json({ error: body.message }, 400);
        }
        return c.json(accept(c, WebhookEndpoints.IncidentIo, INCIDENT_IO_PROVIDER, body), 200);
      },
    );

    this.app.openapi(
      createRoute({
        tags: ['Webhooks'],
        method: 'post',
        path: '/generic/{provider}',
        summary: 'Receive a webhook from any provider',
        description: 'Signature scheme is chosen from the headers present.',
        request: {
          params: schemaPostWebhookParams,
        },
        responses,
      }),
      async (c) => {
        const { provider } = c.req.valid('param');
        const body = await readJsonBody(c);
        if (!body.ok) {
          return c.json({ error: body.message }, 400);
        }
        return c.json(accept(c, WebhookEndpoints.Generic, provider, body), 200);
      },
    );
  }

  private readonly app = new OpenAPIHono();

  public getApp(): OpenAPIHono {
    return this.app;
  }
}

const readJsonBody = async (c: Context): Promise<ParsedBody> => {
  const rawBody = Buffer.from(await c.req.arrayBuffer());

  try {
    const payload: unknown = JSON.parse(rawBody.toString('utf8'));
    return { ok: true, rawBody, payload };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ path: c.req.path, failure: IngestFailures.MalformedPayload }, 'Rejected webhook with invalid JSON');
    return { ok: false, message: `Invalid JSON: ${message}` };
  }
};
