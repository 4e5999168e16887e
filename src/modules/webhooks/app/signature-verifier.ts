import { createHmac, timingSafeEqual } from 'node:crypto';
import type { PushSignature } from '../domain/entity/push-job.entity';
import { SignatureSchemes, WebhookEndpoints } from '../domain/webhook.enums';

export const SIGNATURE_TOLERANCE_SEC = 300;

const SHA256_PREFIX = 'sha256=';
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

export type TimestampedSignatureInput = {
  payload: Buffer | string;
  webhookId: string | undefined;
  timestamp: string | undefined;
  signature: string | undefined;
  secret: string;
  nowSec?: number;
};

export type PlainSignatureInput = {
  payload: Buffer | string;
  signature: string | undefined;
  secret: string;
};

/**
 * Verifies an HMAC-SHA256 hex signature over `{id}.{timestamp}.{payload}`. The signature
 * may be a bare digest or a `version,digest` list. Timestamps more than 300 s away from
 * now are rejected. Malformed input yields false.
 */
export function verifyTimestampedSignature(input: TimestampedSignatureInput): boolean {
  const { webhookId, timestamp, signature, secret } = input;
  if (!webhookId || !timestamp || !signature || !secret) {
    return false;
  }

  if (!INTEGER_PATTERN.test(timestamp)) {
    return false;
  }

  const claimedSec = Number.parseInt(timestamp.trim(), 10);
  const nowSec = input.nowSec ?? Math.floor(Date.now() / 1000);
  if (Math.abs(nowSec - claimedSec) > SIGNATURE_TOLERANCE_SEC) {
    return false;
  }

  const body = typeof input.payload === 'string' ? input.payload : input.payload.toString('utf8');
  const expected = createHmac('sha256', secret).update(`${webhookId}.${timestamp}.${body}`).digest('hex');
  const actual = signature.includes(',') ? (signature.split(',')[1] ?? '') : signature;

  return safeEqual(expected, actual.trim());
}

/**
 * Verifies an HMAC-SHA256 hex signature over the raw payload bytes, with or without a
 * `sha256=` prefix.
 */
export function verifyPlainSignature(input: PlainSignatureInput): boolean {
  const { payload, signature, secret } = input;
  if (!signature || !secret) {
    return false;
  }

  const expected = createHmac('sha256', secret).update(payload).digest('hex');
  const actual = signature.startsWith(SHA256_PREFIX) ? signature.slice(SHA256_PREFIX.length) : signature;

  return safeEqual(expected, actual);
}

type HeaderReader = (name: string) => string | undefined;

/**
 * The named-provider endpoint always uses the timestamped scheme. The generic endpoint
 * picks it when all three `webhook-*` headers are present, falls back to the plain scheme
 * on `X-Signature` / `X-Hub-Signature-256`, and is otherwise unsigned.
 */
export function readPushSignature(endpoint: WebhookEndpoints, header: HeaderReader): PushSignature {
  const webhookId = header('webhook-id');
  const timestamp = header('webhook-timestamp');
  const signature = header('webhook-signature');

  if (endpoint === WebhookEndpoints.IncidentIo || (webhookId && timestamp && signature)) {
    return { scheme: SignatureSchemes.Timestamped, webhookId, timestamp, signature };
  }

  const plain = header('x-signature') ?? header('x-hub-signature-256');
  if (plain) {
    return { scheme: SignatureSchemes.Plain, signature: plain };
  }

  return { scheme: SignatureSchemes.Unsigned };
}

export function verifyPushSignature(
  payload: Buffer,
  signature: PushSignature,
  secret: string,
  nowSec?: number,
): boolean {
  switch (signature.scheme) {
    case SignatureSchemes.Timestamped:
      return verifyTimestampedSignature({
        payload,
        secret,
        nowSec,
        webhookId: signature.webhookId,
        timestamp: signature.timestamp,
        signature: signature.signature,
      });
    case SignatureSchemes.Plain:
      return verifyPlainSignature({ payload, secret, signature: signature.signature });
    case SignatureSchemes.Unsigned:
      return false;
  }
}

const safeEqual = (expected: string, actual: string): boolean => {
  const expectedBuffer = Buffer.from(expected, 'utf8');
  const actualBuffer = Buffer.from(actual, 'utf8');
  if (expectedBuffer.length !== actualBuffer.length) {
    return false;
  }
  return timingSafeEqual(expectedBuffer, actualBuffer);
};
