import { Logger } from '@nestjs/common';
import {
  DroppedMessageReason,
  PUBLISH_FAILED,
  PUBLISH_SUCCESS,
  PublishMessageKind,
  WorkerState,
  errorMessage,
  sleep,
  type PublishMessage,
  type RetryPolicy,
} from '@app/common';
import {
  BrokerClientPurpose,
  type BrokerClient,
  type BrokerClientFactory,
} from '../../domain/clients/broker.client';
import type { WorkQueue } from '../../domain/work-queue';
import type { PoolSignals } from '../../domain/pool-signals';
import type { PoolStats } from '../../domain/entities/pool-stats.entity';
import {
  describePublisherConfig,
  type PublisherConfig,
} from '../../config/publisher.config';

export interface PublishWorkerDeps {
  readonly config: PublisherConfig;
  readonly queue: WorkQueue;
  readonly clientFactory: BrokerClientFactory;
  readonly retryPolicy: RetryPolicy;
  readonly signals: PoolSignals;
  readonly stats: PoolStats;
}

type PublishOutcome = 'published' | 'gave-up' | 'stopped';

/**
 * One worker of the dispatch pool.
 *
 * Loop: drain a batch, publish it front-to-back, sleep when there is nothing
 * to do. A shutdown message is handed back to the queue so every other worker
 * also sees one, then this worker exits.
 *
 * Messages left in the local batch after a shutdown or an unhandled kind are
 * not requeued. They are counted in {@link PoolStats} under their drop reason.
 */
export class PublishWorker {
  private readonly logger = new Logger(PublishWorker.name);
  readonly label: string;
  private currentState = WorkerState.CONNECTING;

  constructor(
    readonly index: number,
    private readonly deps: PublishWorkerDeps,
  ) {
    this.label = `${deps.config.label}-wid-${String(index + 1)}`;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /**
   * Run until a shutdown message is observed or the pool is force-stopped.
   * Never rejects.
   */
  async run(): Promise<void> {
    const { config } = this.deps;
    if (config.brokerList.length === 0 || config.brokerList[0] === '') {
      this.logger.error(
        `${this.label} - no brokers to connect to KAFKA_BROKERS=${JSON.stringify(config.brokerList)} - stopping worker`,
      );
      this.currentState = WorkerState.TERMINATED;
      return;
    }

    if (this.index === 0) {
      this.logger.log(
        `pool connecting with ${describePublisherConfig(config)} batch=${String(config.drainBatchSize)} retry=${this.deps.retryPolicy.describe()}`,
      );
    }

    let client: BrokerClient;
    try {
      client = await this.deps.clientFactory.connect(
        config,
        this.label,
        BrokerClientPurpose.PUBLISH,
      );
    } catch (error) {
      this.logger.error(
        `${this.label} - failed to connect to brokers: ${errorMessage(error)} - stopping worker`,
      );
      this.currentState = WorkerState.TERMINATED;
      return;
    }

    this.logger.verbose(`${this.label} - start`);
    try {
      await this.processLoop(client);
    } finally {
      this.currentState = WorkerState.TERMINATED;
      await client.disconnect().catch((error: unknown) => {
        this.logger.warn(
          `${this.label} - disconnect failed: ${errorMessage(error)}`,
        );
      });
      this.logger.log(`${this.label} - done exiting worker`);
    }
  }

  private async processLoop(client: BrokerClient): Promise<void> {
    const { config, queue, signals } = this.deps;
    while (!signals.isStopped) {
      this.currentState = WorkerState.DRAINING;
      const batch = queue.drain(config.drainBatchSize);
      if (batch.length === 0) {
        this.currentState = WorkerState.IDLE;
        await sleep(config.idleSleepMs, signals.idleWake, signals.stop);
        continue;
      }

      this.logger.verbose(
        `${this.label} - processing ${String(batch.length)} msgs`,
      );
      const terminating = await this.processBatch(client, batch);
      if (terminating) {
        if (batch.length === 0) {
          this.logger.verbose(`${this.label} - work batch empty=0`);
        } else {
          this.logger.error(
            `${this.label} - work batch NOT empty=${String(batch.length)}`,
          );
          this.deps.stats.recordDropped(
            signals.isStopped
              ? DroppedMessageReason.FORCED_STOP
              : DroppedMessageReason.SHUTDOWN_REMAINDER,
            batch.length,
          );
        }
        return;
      }
    }
  }

  /**
   * Consume `batch` in place, front-to-back.
   *
   * @returns true when this worker should exit; `batch` then holds the
   * messages that were never processed
   */
  private async processBatch(
    client: BrokerClient,
    batch: PublishMessage[],
  ): Promise<boolean> {
    const { stats } = this.deps;
    for (let message = batch.shift(); message; message = batch.shift()) {
      switch (message.kind) {
        case PublishMessageKind.SHUTDOWN:
          this.currentState = WorkerState.SHUTTING_DOWN;
          this.requeueShutdown(message);
          return true;

        case PublishMessageKind.DATA:
        case PublishMessageKind.SENSITIVE: {
          this.currentState = WorkerState.PUBLISHING;
          const outcome = await this.publishWithRetry(client, message);
          if (outcome === 'stopped') {
            stats.recordDropped(DroppedMessageReason.FORCED_STOP, 1);
            this.currentState = WorkerState.SHUTTING_DOWN;
            return true;
          }
          break;
        }

        case PublishMessageKind.LOG_BROKER_DETAILS:
        case PublishMessageKind.LOG_BROKER_TOPIC_DETAILS:
          this.logger.log(
            `${this.label} not supported yet - get broker details type=${message.kind} - coming soon`,
          );
          stats.recordDropped(
            DroppedMessageReason.NOT_SUPPORTED_YET,
            batch.length + 1,
          );
          batch.length = 0;
          return false;

        default: {
          const kind: string = message.kind;
          this.logger.error(
            `${this.label} - unsupported PublishMessageKind=${kind}`,
          );
          stats.recordDropped(
            DroppedMessageReason.UNSUPPORTED_KIND,
            batch.length + 1,
          );
          batch.length = 0;
          return false;
        }
      }
    }
    return false;
  }

  private requeueShutdown(message: PublishMessage): void {
    try {
      const total = this.deps.queue.enqueue([message.clone()]);
      this.deps.stats.recordRequeuedShutdown();
      this.logger.verbose(
        `${this.label} - requeue shutdown message success with total in queue=${String(total)}`,
      );
    } catch (error) {
      this.logger.error(
        `${this.label} - failed to requeue shutdown message into queue with err=${errorMessage(error)}`,
      );
    }
    this.deps.signals.wakeIdleWorkers();
  }

  private async publishWithRetry(
    client: BrokerClient,
    message: PublishMessage,
  ): Promise<PublishOutcome> {
    const { retryPolicy, signals, stats } = this.deps;
    const headers = { ...(message.headers ?? {}) };
    this.logger.verbose(
      `${this.label} pub topic=${message.topic} id=${message.id}`,
    );

    for (let attempt = 1; ; attempt += 1) {
      const status = await this.publishOnce(client, message, headers);
      if (status === PUBLISH_SUCCESS) {
        stats.recordPublished();
        this.logger.verbose(`published message topic=${message.topic}`);
        return 'published';
      }

      stats.recordPublishFailure();
      const delayMs = retryPolicy.nextDelayMs(attempt);
      if (delayMs === null) {
        this.logger.error(
          `${this.label} - giving up after ${String(attempt)} attempts delivery status=${String(status)} msg=${message.toString()}`,
        );
        stats.recordDropped(DroppedMessageReason.RETRIES_EXHAUSTED, 1);
        return 'gave-up';
      }

      this.logger.error(
        `${this.label} - failed to publish delivery status=${String(status)} attempt=${String(attempt)} retrying in ${String(delayMs)}ms msg=${message.toString()}`,
      );
      const waited = await sleep(delayMs, signals.stop);
      if (!waited) {
        this.logger.warn(
          `${this.label} - stopped while retrying msg=${message.toString()}`,
        );
        return 'stopped';
      }
    }
  }

  private async publishOnce(
    client: BrokerClient,
    message: PublishMessage,
    headers: Record<string, string>,
  ): Promise<number> {
    try {
      return await client.publish({
        topic: message.topic,
        key: message.key,
        headers,
        payload: message.payload,
        timestamp: Date.now(),
      });
    } catch (error) {
      this.logger.error(
        `${this.label} - publish threw: ${errorMessage(error)}`,
      );
      return PUBLISH_FAILED;
    }
  }
}
