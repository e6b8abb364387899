import type { INestApplication } from '@nestjs/common';
import type { TestingModule } from '@nestjs/testing';
import { Test } from '@nestjs/testing';
import { DroppedMessageReason, PUBLISH_FAILED } from '@app/common';
import { AppModule } from '../apps/dispatcher-service/src/app.module';
import { PublisherService } from '../apps/dispatcher-service/src/application/services/publisher.service';
import { WorkerPoolService } from '../apps/dispatcher-service/src/application/services/worker-pool.service';
import { BROKER_CLIENT_FACTORY } from '../apps/dispatcher-service/src/domain/clients/broker.client';
import {
  PUBLISHER_CONFIG,
  type PublisherConfig,
} from '../apps/dispatcher-service/src/config/publisher.config';
import { FakeBrokerClientFactory } from '../apps/dispatcher-service/test/fake-broker-client';
import {
  buildTestConfig,
  waitFor,
} from '../apps/dispatcher-service/test/test-helpers';

/**
 * Pool Shutdown E2E Tests
 *
 * Closes the whole application while workers are busy and checks what the
 * shutdown hook leaves behind: everything queued before close is published,
 * and workers stuck retrying are force-stopped once the shutdown timeout
 * passes.
 */
describe('Pool shutdown on application close (e2e)', () => {
  let broker: FakeBrokerClientFactory;

  const createApp = async (
    config: PublisherConfig,
  ): Promise<INestApplication> => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(PUBLISHER_CONFIG)
      .useValue(config)
      .overrideProvider(BROKER_CLIENT_FACTORY)
      .useValue(broker)
      .compile();

    const app = moduleFixture.createNestApplication();
    await app.init();
    return app;
  };

  beforeEach(() => {
    broker = new FakeBrokerClientFactory();
  });

  it('should publish every queued message before closing', async () => {
    const app = await createApp(buildTestConfig({ KAFKA_NUM_WORKERS: '3' }));
    const publisher = app.get(PublisherService);
    const pool = app.get(WorkerPoolService);
    for (let index = 0; index < 50; index += 1) {
      publisher.addDataMessage(
        'testing',
        `key-${String(index % 5)}`,
        null,
        `test message ${String(index)}`,
      );
    }

    await app.close();

    expect(pool.isRunning).toBe(false);
    expect(broker.published).toHaveLength(50);
    expect(new Set(broker.publishedPayloads()).size).toBe(50);
    expect(pool.snapshot().stats.published).toBe(50);
    expect(pool.snapshot().stats.dropped).toEqual({
      UnsupportedMessageKind: 0,
      NotSupportedYet: 0,
      ShutdownRemainder: 0,
      RetriesExhausted: 0,
      ForcedStop: 0,
    });
    expect(broker.disconnects).toBe(3);
  });

  it('should force-stop a worker still retrying after the shutdown timeout', async () => {
    broker.publishStatuses.push(PUBLISH_FAILED);
    const app = await createApp(
      buildTestConfig({
        KAFKA_NUM_WORKERS: '1',
        KAFKA_PUBLISH_RETRY_INTERVAL_SEC: '60',
        KAFKA_SHUTDOWN_TIMEOUT_MS: '100',
      }),
    );
    const publisher = app.get(PublisherService);
    const pool = app.get(WorkerPoolService);
    publisher.addDataMessage('testing', 'key', null, 'test message 0');
    await waitFor(() => pool.snapshot().stats.publishFailures === 1);

    await app.close();

    expect(pool.isRunning).toBe(false);
    expect(broker.published).toEqual([]);
    expect(
      pool.snapshot().stats.dropped[DroppedMessageReason.FORCED_STOP],
    ).toBe(1);
  });
});
