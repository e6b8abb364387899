import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  KAFKA_NOT_ENABLED,
  PublishMessageKind,
  SHUTDOWN_STARTED,
  buildPublishMessage,
  buildShutdownMessage,
  type MessageHeaders,
  type MessagePayload,
  type PublishMessage,
} from '@app/common';
import { WORK_QUEUE, WorkQueue } from '../../domain/work-queue';
import {
  PUBLISHER_CONFIG,
  type PublisherConfig,
} from '../../config/publisher.config';
import { MetadataService } from './metadata.service';
import type { ClusterMetadataReport } from '../dtos/metadata-report.dto';

/**
 * Entry point for code that wants messages published.
 *
 * Every method is a no-op when the pool is disabled (KAFKA_ENABLED). Nothing
 * here waits for a publish to happen: callers get the queue length back and
 * never hear about publish failures.
 */
@Injectable()
export class PublisherService {
  private readonly logger = new Logger(PublisherService.name);

  constructor(
    @Inject(PUBLISHER_CONFIG) readonly config: PublisherConfig,
    @Inject(WORK_QUEUE) private readonly queue: WorkQueue,
    private readonly metadataService: MetadataService,
  ) {}

  get isEnabled(): boolean {
    return this.config.isEnabled;
  }

  get queueDepth(): number {
    return this.queue.size;
  }

  /**
   * Build a data message and queue it.
   *
   * @param topic - Kafka topic to publish into
   * @param key - Partition key
   * @param headers - Optional message headers
   * @param payload - Message body
   * @returns Queue length after the append, or 0 when disabled
   */
  addDataMessage(
    topic: string,
    key: string,
    headers: MessageHeaders | null | undefined,
    payload: MessagePayload,
  ): number {
    if (!this.isEnabled) {
      return 0;
    }
    return this.queue.enqueue([
      buildPublishMessage(PublishMessageKind.DATA, topic, key, headers, payload),
    ]);
  }

  addMessage(message: PublishMessage): number {
    if (!this.isEnabled) {
      return 0;
    }
    return this.queue.enqueue([message]);
  }

  addMessages(messages: readonly PublishMessage[]): number {
    if (!this.isEnabled) {
      return 0;
    }
    return this.queue.enqueue(messages);
  }

  /**
   * Take every pending message out of the queue without publishing it.
   * Meant for tests and inspection.
   */
  drainMessages(): PublishMessage[] {
    if (!this.isEnabled) {
      return [];
    }
    return this.queue.drainAll();
  }

  /**
   * Queue a single shutdown message. Returns once it is queued, not once
   * the workers have stopped.
   */
  shutdown(): string {
    if (!this.isEnabled) {
      return KAFKA_NOT_ENABLED;
    }
    this.logger.log('sending shutdown msg');
    this.queue.enqueue([buildShutdownMessage()]);
    return SHUTDOWN_STARTED;
  }

  /**
   * @returns The cluster report, or null when the pool is disabled
   */
  async getMetadata(
    fetchOffsets: boolean,
    topic?: string,
  ): Promise<ClusterMetadataReport | null> {
    if (!this.isEnabled) {
      this.logger.log(
        `kafka not enabled KAFKA_ENABLED=${String(this.config.isEnabled)}`,
      );
      return null;
    }
    return this.metadataService.getMetadata(fetchOffsets, topic);
  }
}
