import { readFileSync } from 'node:fs';
import { Logger } from '@nestjs/common';
import {
  Kafka,
  KafkaJSProtocolError,
  Partitioners,
  logLevel,
  type Admin,
  type KafkaConfig,
  type PartitionMetadata as KafkaPartitionMetadata,
  type Producer,
} from 'kafkajs';
import {
  PUBLISH_FAILED,
  PUBLISH_SUCCESS,
  errorMessage,
  withTimeout,
} from '@app/common';
import {
  BrokerClientPurpose,
  type BrokerClient,
  type ClusterMetadata,
  type OutboundRecord,
  type PartitionMetadata,
  type TopicMetadata,
  type Watermarks,
} from '../../domain/clients/broker.client';
import {
  hasTlsMaterial,
  type PublisherConfig,
} from '../../config/publisher.config';

type ReadFile = (path: string) => Buffer;

type TopicOffsets = Awaited<ReturnType<Admin['fetchTopicOffsets']>>;

/**
 * Build the kafkajs client options for one connection.
 *
 * Blank broker entries are left out. When any TLS path is set the connection
 * uses TLS with server verification, loading only the files that are set.
 */
export function buildKafkaConfig(
  config: PublisherConfig,
  clientLabel: string,
  readFile: ReadFile = readFileSync,
): KafkaConfig {
  const kafkaConfig: KafkaConfig = {
    clientId: `${config.clientId}-${clientLabel}`,
    brokers: config.brokerList.filter((broker) => broker !== ''),
    logLevel: logLevel.WARN,
    retry: {
      initialRetryTime: 300,
      retries: 5,
    },
  };
  if (!hasTlsMaterial(config.tls)) {
    return kafkaConfig;
  }
  const { key, cert, ca } = config.tls;
  return {
    ...kafkaConfig,
    ssl: {
      rejectUnauthorized: true,
      ...(ca === '' ? {} : { ca: [readFile(ca)] }),
      ...(cert === '' ? {} : { cert: readFile(cert) }),
      ...(key === '' ? {} : { key: readFile(key) }),
    },
  };
}

/**
 * Map a failed send to a delivery status: the broker's error code when it
 * returned one, -1 otherwise.
 */
export function deliveryStatusOf(error: unknown): number {
  return error instanceof KafkaJSProtocolError && error.code !== 0
    ? error.code
    : PUBLISH_FAILED;
}

export function toPartitionMetadata(
  partition: KafkaPartitionMetadata,
): PartitionMetadata {
  return {
    id: partition.partitionId,
    leader: partition.leader,
    replicas: [...partition.replicas],
    isr: [...partition.isr],
    error:
      partition.partitionErrorCode === 0
        ? null
        : `partition error code=${String(partition.partitionErrorCode)}`,
  };
}

/**
 * {@link BrokerClient} on kafkajs. The producer backs publishing and the
 * admin client backs metadata and watermark lookups; each connects on first
 * use if the purpose given at connect time did not already open it.
 *
 * Topic offsets are fetched once per topic and connection, so every partition
 * of a topic is served by the same request.
 */
export class KafkaBrokerClient implements BrokerClient {
  private readonly logger = new Logger(KafkaBrokerClient.name);
  private producer: Producer | null = null;
  private admin: Admin | null = null;
  private readonly topicOffsets = new Map<string, Promise<TopicOffsets>>();

  constructor(
    config: PublisherConfig,
    private readonly clientLabel: string,
    private readonly kafka: Kafka = new Kafka(
      buildKafkaConfig(config, clientLabel),
    ),
  ) {}

  async connect(purpose: BrokerClientPurpose): Promise<void> {
    if (purpose === BrokerClientPurpose.PUBLISH) {
      await this.ensureProducer();
    } else {
      await this.ensureAdmin();
    }
    this.logger.debug(`${this.clientLabel} - connected for ${purpose}`);
  }

  async publish(record: OutboundRecord): Promise<number> {
    const producer = await this.ensureProducer();
    try {
      const results = await producer.send({
        topic: record.topic,
        messages: [
          {
            key: record.key,
            value: record.payload,
            headers: record.headers,
            timestamp: String(record.timestamp),
          },
        ],
      });
      const failed = results.find((result) => result.errorCode !== 0);
      return failed === undefined ? PUBLISH_SUCCESS : failed.errorCode;
    } catch (error) {
      this.logger.warn(
        `${this.clientLabel} - send failed: ${errorMessage(error)}`,
      );
      return deliveryStatusOf(error);
    }
  }

  async fetchMetadata(
    topic: string | undefined,
    timeoutMs: number,
  ): Promise<ClusterMetadata> {
    const admin = await this.ensureAdmin();
    return withTimeout(
      this.describe(admin, topic),
      timeoutMs,
      'fetch metadata',
    );
  }

  async fetchWatermarks(
    topic: string,
    partition: number,
    timeoutMs: number,
  ): Promise<Watermarks> {
    const offsets = await this.fetchTopicOffsets(topic, timeoutMs);
    const entry = offsets.find((offset) => offset.partition === partition);
    if (entry === undefined) {
      throw new Error(
        `no offsets for topic=${topic} partition=${String(partition)}`,
      );
    }
    return { low: Number(entry.low), high: Number(entry.high) };
  }

  async disconnect(): Promise<void> {
    const producer = this.producer;
    const admin = this.admin;
    this.producer = null;
    this.admin = null;
    this.topicOffsets.clear();
    await Promise.all([producer?.disconnect(), admin?.disconnect()]);
  }

  private fetchTopicOffsets(
    topic: string,
    timeoutMs: number,
  ): Promise<TopicOffsets> {
    let offsets = this.topicOffsets.get(topic);
    if (offsets === undefined) {
      offsets = this.ensureAdmin().then((admin) =>
        withTimeout(
          admin.fetchTopicOffsets(topic),
          timeoutMs,
          `fetch watermarks ${topic}`,
        ),
      );
      this.topicOffsets.set(topic, offsets);
    }
    return offsets;
  }

  private async ensureProducer(): Promise<Producer> {
    if (this.producer === null) {
      const producer = this.kafka.producer({
        createPartitioner: Partitioners.DefaultPartitioner,
      });
      await producer.connect();
      this.producer = producer;
    }
    return this.producer;
  }

  private async ensureAdmin(): Promise<Admin> {
    if (this.admin === null) {
      const admin = this.kafka.admin();
      await admin.connect();
      this.admin = admin;
    }
    return this.admin;
  }

  private async describe(
    admin: Admin,
    topic: string | undefined,
  ): Promise<ClusterMetadata> {
    const cluster = await admin.describeCluster();
    const brokers = cluster.brokers.map((broker) => ({
      id: broker.nodeId,
      host: broker.host,
      port: broker.port,
    }));

    let topics: TopicMetadata[];
    if (topic === undefined) {
      const names = await admin.listTopics();
      const metadata = await admin.fetchTopicMetadata({ topics: names });
      topics = metadata.topics.map((found) => ({
        name: found.name,
        error: null,
        partitions: found.partitions.map(toPartitionMetadata),
      }));
    } else {
      topics = [await this.describeTopic(admin, topic)];
    }
    return { brokers, topics };
  }

  private async describeTopic(
    admin: Admin,
    topic: string,
  ): Promise<TopicMetadata> {
    try {
      const metadata = await admin.fetchTopicMetadata({ topics: [topic] });
      const found = metadata.topics.find((entry) => entry.name === topic);
      return {
        name: topic,
        error: found === undefined ? 'topic not found' : null,
        partitions: found?.partitions.map(toPartitionMetadata) ?? [],
      };
    } catch (error) {
      return { name: topic, error: errorMessage(error), partitions: [] };
    }
  }
}
