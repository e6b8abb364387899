import { Injectable, Logger } from '@nestjs/common';
import {
  BackOffPolicy,
  Retryable,
  type RetryOptions,
} from 'typescript-retry-decorator';
import { BrokerUnavailableError } from '@app/common';
import type {
  BrokerClient,
  BrokerClientFactory,
  BrokerClientPurpose,
} from '../../domain/clients/broker.client';
import type { PublisherConfig } from '../../config/publisher.config';
import { KafkaBrokerClient } from './kafka.broker-client';

const CONNECT_RETRY_CONFIG = {
  maxAttempts: 3,
  backOffPolicy: BackOffPolicy.ExponentialBackOffPolicy,
  backOff: 500,
  exponentialOption: { maxInterval: 4000, multiplier: 2 },
  doRetry: (error: unknown) => !(error instanceof BrokerUnavailableError),
  useOriginalError: true,
  useConsoleLogger: false,
} satisfies RetryOptions;

@Injectable()
export class KafkaBrokerClientFactory implements BrokerClientFactory {
  private readonly logger = new Logger(KafkaBrokerClientFactory.name);

  /**
   * Open a kafkajs connection for `purpose`. Retried with exponential backoff
   * before the caller sees the error.
   */
  @Retryable(CONNECT_RETRY_CONFIG)
  async connect(
    config: PublisherConfig,
    clientLabel: string,
    purpose: BrokerClientPurpose,
  ): Promise<BrokerClient> {
    if (config.brokerList.every((broker) => broker === '')) {
      throw new BrokerUnavailableError(config.brokerList);
    }
    this.logger.debug(
      `${clientLabel} - connecting to ${config.brokerList.join(',')}`,
    );
    const client = new KafkaBrokerClient(config, clientLabel);
    await client.connect(purpose);
    return client;
  }
}
