import type { SignatureSchemes, WebhookEndpoints } from '../webhook.enums';

export type PushSignature =
  | {
      scheme: SignatureSchemes.Timestamped;
      webhookId: string | undefined;
      timestamp: string | undefined;
      signature: string | undefined;
    }
  | { scheme: SignatureSchemes.Plain; signature: string }
  | { scheme: SignatureSchemes.Unsigned };

export type PushJob = {
  endpoint: WebhookEndpoints;
  provider: string;
  rawBody: Buffer;
  payload: unknown;
  signature: PushSignature;
  receivedAt: string;
};
