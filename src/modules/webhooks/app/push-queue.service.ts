import { inject, injectable } from 'inversify';
import { logger } from '@/core/logger';
import { IngestDeps } from '@/modules/ingest/domain/dep/ingest.dep';
import { IngestFailures } from '@/modules/ingest/domain/ingest.enums';
import type { IIngestionCoordinator } from '@/modules/ingest/domain/port/ingestion-coordinator.interface';
import { WebhookDeps } from '../domain/dep/webhook.dep';
import type { PushJob } from '../domain/entity/push-job.entity';
import { WebhookEndpoints } from '../domain/webhook.enums';
import { verifyPushSignature } from './signature-verifier';

export type PushQueueOptions = {
  capacity: number;
  concurrency: number;
  secrets: Partial<Record<WebhookEndpoints, string>>;
};

/**
 * Bounded handoff between the webhook routes and the coordinator. `enqueue` returns
 * before any verification or ingestion work starts; jobs then run with bounded
 * concurrency. Verification is enforced for an endpoint only when it has a secret.
 */
@injectable()
export class PushQueueService {
  private readonly pending: PushJob[] = [];
  private readonly idleWaiters: (() => void)[] = [];
  private active = 0;
  private accepting = true;

  constructor(
    @inject(IngestDeps.IngestionCoordinator)
    private readonly coordinator: IIngestionCoordinator,
    @inject(WebhookDeps.PushQueueOptions)
    private readonly options: PushQueueOptions,
  ) {}

  public get depth(): number {
    return this.pending.length + this.active;
  }

  public enqueue(job: PushJob): boolean {
    if (!this.accepting) {
      logger.warn({ provider: job.provider }, 'Push queue draining, dropping job');
      return false;
    }

    if (this.pending.length >= this.options.capacity) {
      logger.warn({ provider: job.provider, capacity: this.options.capacity }, 'Push queue full, dropping job');
      return false;
    }

    this.pending.push(job);
    queueMicrotask(() => this.pump());
    return true;
  }

  /**
   * Stops accepting jobs and resolves once queued and in-flight jobs have finished.
   */
  public async drain(): Promise<void> {
    this.accepting = false;
    if (this.depth === 0) {
      return;
    }

    logger.debug({ depth: this.depth }, 'Draining push queue');
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.active < this.options.concurrency) {
      const job = this.pending.shift();
      if (!job) {
        break;
      }

      this.active += 1;
      void this.runJob(job).finally(() => {
        this.active -= 1;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private async runJob(job: PushJob): Promise<void> {
    logger.debug({ provider: job.provider, waitMs: Date.now() - Date.parse(job.receivedAt) }, 'Processing push job');

    try {
      const secret = this.options.secrets[job.endpoint];
      if (secret && !verifyPushSignature(job.rawBody, job.signature, secret)) {
        logger.warn(
          { provider: job.provider, scheme: job.signature.scheme, failure: IngestFailures.Verification },
          'Push signature verification failed',
        );
        return;
      }

      await this.coordinator.ingestPush(job.payload, job.provider);
    } catch (error) {
      logger.error({ error, provider: job.provider, failure: IngestFailures.Unexpected }, 'Push job failed');
    }
  }

  private notifyIdle(): void {
    if (this.depth > 0) {
      return;
    }

    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
