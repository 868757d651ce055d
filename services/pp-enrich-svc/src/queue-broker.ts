import { connectRedis, getLogger } from '@pp/common';
import type { Redis } from 'ioredis';
import pLimit from 'p-limit';

import type { EnrichmentQueueConfig } from './config';

/** A delivered task. `receipt` identifies it for ack and nack. */
export interface QueueMessage {
  jobId: string;
  receipt: string;
}

export interface QueueBroker {
  enqueue(jobId: string): Promise<void>;
  /** Resolves null when nothing arrives within the timeout. */
  dequeue(timeoutMs: number): Promise<QueueMessage | null>;
  ack(message: QueueMessage): Promise<void>;
  /** Returns the task to the queue once `delayMs` has passed. */
  nack(message: QueueMessage, delayMs: number): Promise<void>;
  depth(): Promise<number>;
  /** Returns tasks a previous consumer took but never acked to the ready queue. */
  requeueInFlight(): Promise<number>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export type QueueConnectionFactory = (role: 'command' | 'blocking') => Promise<Redis>;

const MIN_BLOCK_SECONDS = 0.01;

/**
 * List-backed queue. Ready tasks sit in `{queueKey}`, tasks handed to a worker
 * in `{queueKey}:processing` until acked, and delayed retries in the sorted
 * set `{queueKey}:delayed` scored by due time.
 *
 * Blocking pops run on their own connection, one at a time.
 */
export class RedisQueueBroker implements QueueBroker {
  private readonly logger = getLogger({ module: 'enrich-queue' });
  private readonly blockingSerial = pLimit(1);
  private command: Promise<Redis> | null = null;
  private blocking: Promise<Redis> | null = null;

  constructor(
    private readonly config: EnrichmentQueueConfig,
    private readonly connect: QueueConnectionFactory = (role) =>
      connectRedis({ name: `queue-${role}`, url: config.url, failFast: true, maxReconnectAttempts: 3 })
  ) {}

  private get processingKey(): string {
    return `${this.config.queueKey}:processing`;
  }

  private get delayedKey(): string {
    return `${this.config.queueKey}:delayed`;
  }

  async enqueue(jobId: string): Promise<void> {
    const redis = await this.commandClient();
    await redis.lpush(this.config.queueKey, jobId);
    this.logger.debug({ jobId, queueKey: this.config.queueKey }, 'Enqueued enrichment task.');
  }

  async dequeue(timeoutMs: number): Promise<QueueMessage | null> {
    const redis = await this.blockingClient();
    const timeoutSeconds = Math.max(MIN_BLOCK_SECONDS, timeoutMs / 1000);
    // Promotion watches the delayed set, so it shares the serialized blocking connection.
    const jobId = await this.blockingSerial(async () => {
      await this.promoteDue(redis);
      return redis.blmove(this.config.queueKey, this.processingKey, 'RIGHT', 'LEFT', timeoutSeconds);
    });
    if (!jobId) {
      return null;
    }
    return { jobId, receipt: jobId };
  }

  async ack(message: QueueMessage): Promise<void> {
    const redis = await this.commandClient();
    await redis.lrem(this.processingKey, 1, message.receipt);
  }

  async nack(message: QueueMessage, delayMs: number): Promise<void> {
    const redis = await this.commandClient();
    const dueAt = Date.now() + Math.max(0, delayMs);
    await redis.multi().lrem(this.processingKey, 1, message.receipt).zadd(this.delayedKey, dueAt, message.jobId).exec();
    this.logger.debug({ jobId: message.jobId, delayMs }, 'Scheduled enrichment task redelivery.');
  }

  async depth(): Promise<number> {
    const redis = await this.commandClient();
    const [ready, delayed] = await Promise.all([redis.llen(this.config.queueKey), redis.zcard(this.delayedKey)]);
    return ready + delayed;
  }

  /**
   * Moves tasks left in the processing list by a previous run back onto the
   * ready queue. Called once before consumers start.
   */
  async requeueInFlight(): Promise<number> {
    const redis = await this.commandClient();
    let moved = 0;
    while ((await redis.lmove(this.processingKey, this.config.queueKey, 'RIGHT', 'RIGHT')) !== null) {
      moved += 1;
    }
    if (moved > 0) {
      this.logger.warn({ moved }, 'Requeued tasks left in flight by a previous worker.');
    }
    return moved;
  }

  async ping(): Promise<void> {
    const redis = await this.commandClient();
    await redis.ping();
  }

  async close(): Promise<void> {
    const clients = [this.command, this.blocking];
    this.command = null;
    this.blocking = null;
    for (const pending of clients) {
      if (!pending) {
        continue;
      }
      try {
        const client = await pending;
        client.disconnect();
      } catch (error) {
        this.logger.warn({ error }, 'Queue connection was not open at shutdown.');
      }
    }
  }

  /**
   * Moves due entries from the delayed set to the ready queue. Removal and
   * push commit together, and only while no other consumer touched the set.
   */
  private async promoteDue(redis: Redis): Promise<void> {
    const due = await redis.zrangebyscore(this.delayedKey, '-inf', Date.now());
    for (const jobId of due) {
      await redis.watch(this.delayedKey);
      if ((await redis.zscore(this.delayedKey, jobId)) === null) {
        await redis.unwatch();
        continue;
      }
      const committed = await redis.multi().zrem(this.delayedKey, jobId).lpush(this.config.queueKey, jobId).exec();
      if (!committed) {
        this.logger.debug({ jobId }, 'Delayed set changed during promotion; leaving entry for the next dequeue.');
      }
    }
  }

  private commandClient(): Promise<Redis> {
    if (!this.command) {
      const pending = this.connect('command');
      void pending.catch(() => {
        if (this.command === pending) {
          this.command = null;
        }
      });
      this.command = pending;
    }
    return this.command;
  }

  private blockingClient(): Promise<Redis> {
    if (!this.blocking) {
      const pending = this.connect('blocking');
      void pending.catch(() => {
        if (this.blocking === pending) {
          this.blocking = null;
        }
      });
      this.blocking = pending;
    }
    return this.blocking;
  }
}
