import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  METADATA_FETCH_TIMEOUT_MS,
  UNKNOWN_WATERMARKS,
  WATERMARK_FETCH_TIMEOUT_MS,
  errorMessage,
} from '@app/common';
import {
  BROKER_CLIENT_FACTORY,
  BrokerClientPurpose,
  type BrokerClient,
  type BrokerClientFactory,
  type PartitionMetadata,
  type TopicMetadata,
  type Watermarks,
} from '../../domain/clients/broker.client';
import {
  PUBLISHER_CONFIG,
  describePublisherConfig,
  type PublisherConfig,
} from '../../config/publisher.config';
import type {
  ClusterMetadataReport,
  PartitionReport,
  TopicReport,
} from '../dtos/metadata-report.dto';

/**
 * One-shot, read-only inspection of the cluster: brokers, topics, partitions
 * and (optionally) message counts estimated from partition watermarks.
 */
@Injectable()
export class MetadataService {
  private readonly logger = new Logger(MetadataService.name);

  constructor(
    @Inject(PUBLISHER_CONFIG) private readonly config: PublisherConfig,
    @Inject(BROKER_CLIENT_FACTORY)
    private readonly clientFactory: BrokerClientFactory,
  ) {}

  /**
   * Open a dedicated connection and report cluster metadata.
   *
   * @param fetchOffsets - Also fetch watermarks and count messages per topic
   * @param topic - Restrict the report to this topic; all topics when omitted
   */
  async getMetadata(
    fetchOffsets: boolean,
    topic?: string,
  ): Promise<ClusterMetadataReport> {
    this.logger.log(
      `getting metadata ${describePublisherConfig(this.config)}`,
    );
    const client = await this.clientFactory.connect(
      this.config,
      `${this.config.label}-metadata`,
      BrokerClientPurpose.METADATA,
    );
    try {
      return await this.collect(client, fetchOffsets, topic);
    } finally {
      await client.disconnect().catch((error: unknown) => {
        this.logger.warn(
          `metadata client disconnect failed: ${errorMessage(error)}`,
        );
      });
    }
  }

  private async collect(
    client: BrokerClient,
    fetchOffsets: boolean,
    topic: string | undefined,
  ): Promise<ClusterMetadataReport> {
    const metadata = await client.fetchMetadata(
      topic,
      METADATA_FETCH_TIMEOUT_MS,
    );

    const brokerListing = metadata.brokers
      .map(
        (broker) =>
          `broker.id=${String(broker.id)} address=${broker.host}:${String(broker.port)}`,
      )
      .join(' ');
    this.logger.log(
      `cluster info brokers=${String(metadata.brokers.length)} num_topics=${String(metadata.topics.length)} ${brokerListing}`,
    );

    const topics: TopicReport[] = [];
    for (const found of metadata.topics) {
      topics.push(await this.reportTopic(client, found, fetchOffsets));
    }

    return {
      brokers: metadata.brokers.map((broker) => ({ ...broker })),
      topics,
    };
  }

  private async reportTopic(
    client: BrokerClient,
    topic: TopicMetadata,
    fetchOffsets: boolean,
  ): Promise<TopicReport> {
    this.logger.log(`topic=${topic.name} err=${topic.error ?? 'none'}`);

    let messageCount = 0;
    const partitions: PartitionReport[] = [];
    for (const partition of topic.partitions) {
      this.logger.log(
        `topic=${topic.name} - partition=${String(partition.id)} ` +
          `leader=${String(partition.leader)} replicas=${JSON.stringify(partition.replicas)} ` +
          `ISR=${JSON.stringify(partition.isr)} err=${partition.error ?? 'none'}`,
      );
      let watermarks: Watermarks | null = null;
      if (fetchOffsets) {
        watermarks = await this.fetchWatermarks(client, topic.name, partition);
        const difference = watermarks.high - watermarks.low;
        this.logger.log(
          `topic=${topic.name} - watermark low=${String(watermarks.low)} high=${String(watermarks.high)} (difference=${String(difference)})`,
        );
        messageCount += difference;
      }
      partitions.push({
        id: partition.id,
        leader: partition.leader,
        replicas: [...partition.replicas],
        isr: [...partition.isr],
        error: partition.error,
        watermarks,
      });
    }

    if (fetchOffsets) {
      this.logger.log(
        `topic=${topic.name} - message offset=${String(messageCount)}`,
      );
    }

    return {
      name: topic.name,
      error: topic.error,
      partitions,
      messageCount: fetchOffsets ? messageCount : null,
    };
  }

  private async fetchWatermarks(
    client: BrokerClient,
    topic: string,
    partition: PartitionMetadata,
  ): Promise<Watermarks> {
    try {
      return await client.fetchWatermarks(
        topic,
        partition.id,
        WATERMARK_FETCH_TIMEOUT_MS,
      );
    } catch (error) {
      this.logger.warn(
        `topic=${topic} - partition=${String(partition.id)} watermarks unavailable: ${errorMessage(error)}`,
      );
      return { ...UNKNOWN_WATERMARKS };
    }
  }
}
