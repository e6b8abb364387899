import type { MessagePayload } from '@app/common';
import type { PublisherConfig } from '../../config/publisher.config';

/**
 * Record handed to the broker, in the broker's own envelope.
 */
export interface OutboundRecord {
  readonly topic: string;
  readonly key: string;
  readonly headers: Record<string, string>;
  readonly payload: MessagePayload;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export interface BrokerInfo {
  readonly id: number;
  readonly host: string;
  readonly port: number;
}

export interface PartitionMetadata {
  readonly id: number;
  readonly leader: number;
  readonly replicas: readonly number[];
  readonly isr: readonly number[];
  readonly error: string | null;
}

export interface TopicMetadata {
  readonly name: string;
  readonly error: string | null;
  readonly partitions: readonly PartitionMetadata[];
}

export interface ClusterMetadata {
  readonly brokers: readonly BrokerInfo[];
  readonly topics: readonly TopicMetadata[];
}

export interface Watermarks {
  readonly low: number;
  readonly high: number;
}

export enum BrokerClientPurpose {
  PUBLISH = 'publish',
  METADATA = 'metadata',
}

/**
 * Connection to the broker cluster. Each worker owns exactly one.
 */
export interface BrokerClient {
  /**
   * Publish a single record.
   *
   * @returns Delivery status; 0 means the broker acknowledged the record
   */
  publish(record: OutboundRecord): Promise<number>;

  /**
   * Fetch cluster metadata for one topic, or for every topic when omitted.
   */
  fetchMetadata(
    topic: string | undefined,
    timeoutMs: number,
  ): Promise<ClusterMetadata>;

  fetchWatermarks(
    topic: string,
    partition: number,
    timeoutMs: number,
  ): Promise<Watermarks>;

  disconnect(): Promise<void>;
}

export interface BrokerClientFactory {
  /**
   * Open a connection. Rejects when the cluster cannot be reached.
   */
  connect(
    config: PublisherConfig,
    clientLabel: string,
    purpose: BrokerClientPurpose,
  ): Promise<BrokerClient>;
}

export const BROKER_CLIENT_FACTORY = Symbol('BROKER_CLIENT_FACTORY');
