import { Logger } from '@nestjs/common';
import {
  DroppedMessageReason,
  FixedIntervalRetryPolicy,
  PUBLISH_FAILED,
  PublishMessageKind,
  WorkerState,
  buildPublishMessage,
  buildShutdownMessage,
  type PublishMessage,
  type RetryPolicy,
} from '@app/common';
import { PublishWorker } from './publish-worker';
import { WorkQueue } from '../../domain/work-queue';
import { PoolSignals } from '../../domain/pool-signals';
import { PoolStats } from '../../domain/entities/pool-stats.entity';
import { BrokerClientPurpose } from '../../domain/clients/broker.client';
import type { PublisherConfig } from '../../config/publisher.config';
import { FakeBrokerClientFactory } from '../../../test/fake-broker-client';
import { buildTestConfig, waitFor } from '../../../test/test-helpers';

function dataMessage(index: number): PublishMessage {
  return buildPublishMessage(
    PublishMessageKind.DATA,
    'testing',
    `key-${String(index)}`,
    null,
    `test message ${String(index)}`,
  );
}

describe('PublishWorker', () => {
  let config: PublisherConfig;
  let queue: WorkQueue;
  let broker: FakeBrokerClientFactory;
  let signals: PoolSignals;
  let stats: PoolStats;

  const createWorker = (
    retryPolicy: RetryPolicy = new FixedIntervalRetryPolicy(10),
    index = 0,
  ): PublishWorker =>
    new PublishWorker(index, {
      config,
      queue,
      clientFactory: broker,
      retryPolicy,
      signals,
      stats,
    });

  beforeEach(() => {
    config = buildTestConfig();
    queue = new WorkQueue();
    broker = new FakeBrokerClientFactory();
    signals = new PoolSignals();
    stats = new PoolStats();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should publish in FIFO order and requeue the shutdown message', async () => {
    const messages = Array.from({ length: 100 }, (_, index) =>
      dataMessage(index),
    );
    queue.enqueue([...messages, buildShutdownMessage()]);
    const worker = createWorker();

    await worker.run();

    expect(broker.publishedPayloads()).toEqual(
      messages.map((_, index) => `test message ${String(index)}`),
    );
    expect(broker.published[0]).toMatchObject({
      topic: 'testing',
      key: 'key-0',
      headers: {},
    });
    expect(broker.connections).toEqual([
      { label: 'test-wid-1', purpose: BrokerClientPurpose.PUBLISH },
    ]);
    expect(broker.disconnects).toBe(1);
    expect(worker.state).toBe(WorkerState.TERMINATED);

    const left = queue.drainAll();
    expect(left).toHaveLength(1);
    expect(left[0].kind).toBe(PublishMessageKind.SHUTDOWN);
    expect(stats.snapshot()).toMatchObject({
      published: 100,
      requeuedShutdowns: 1,
    });
  });

  it('should drop the rest of its batch after a shutdown message', async () => {
    queue.enqueue([
      dataMessage(0),
      buildShutdownMessage(),
      dataMessage(1),
      dataMessage(2),
    ]);

    await createWorker().run();

    expect(broker.publishedPayloads()).toEqual(['test message 0']);
    expect(
      stats.snapshot().dropped[DroppedMessageReason.SHUTDOWN_REMAINDER],
    ).toBe(2);
    expect(queue.drainAll().map((message) => message.kind)).toEqual([
      PublishMessageKind.SHUTDOWN,
    ]);
  });

  it('should retry a failed publish until it succeeds', async () => {
    broker.publishStatuses.push(PUBLISH_FAILED, 5);
    queue.enqueue([dataMessage(0), dataMessage(1), buildShutdownMessage()]);

    await createWorker().run();

    expect(broker.publishedPayloads()).toEqual([
      'test message 0',
      'test message 1',
    ]);
    expect(stats.snapshot()).toMatchObject({
      published: 2,
      publishFailures: 2,
    });
  });

  it('should give up on a message once the retry policy does', async () => {
    broker.publishStatuses.push(PUBLISH_FAILED, PUBLISH_FAILED);
    queue.enqueue([dataMessage(0), dataMessage(1), buildShutdownMessage()]);

    await createWorker(new FixedIntervalRetryPolicy(10, 2)).run();

    expect(broker.publishedPayloads()).toEqual(['test message 1']);
    expect(
      stats.snapshot().dropped[DroppedMessageReason.RETRIES_EXHAUSTED],
    ).toBe(1);
  });

  it('should drop the rest of the batch at a broker-details request', async () => {
    queue.enqueue([
      dataMessage(0),
      buildPublishMessage(
        PublishMessageKind.LOG_BROKER_DETAILS,
        '',
        '',
        null,
        '',
      ),
      dataMessage(1),
      dataMessage(2),
    ]);
    const running = createWorker().run();

    await waitFor(
      () =>
        stats.snapshot().dropped[DroppedMessageReason.NOT_SUPPORTED_YET] === 3,
    );
    queue.enqueue([dataMessage(3), buildShutdownMessage()]);
    await running;

    expect(broker.publishedPayloads()).toEqual([
      'test message 0',
      'test message 3',
    ]);
  });

  it('should drop the rest of the batch at a topic-details request', async () => {
    const infoLog = jest
      .spyOn(Logger.prototype, 'log')
      .mockImplementation(() => undefined);
    queue.enqueue([
      buildPublishMessage(
        PublishMessageKind.LOG_BROKER_TOPIC_DETAILS,
        'testing',
        '',
        null,
        '',
      ),
      dataMessage(0),
    ]);
    const running = createWorker().run();

    await waitFor(
      () =>
        stats.snapshot().dropped[DroppedMessageReason.NOT_SUPPORTED_YET] === 2,
    );
    queue.enqueue([dataMessage(1), buildShutdownMessage()]);
    await running;

    expect(broker.publishedPayloads()).toEqual(['test message 1']);
    expect(infoLog).toHaveBeenCalledWith(
      'test-wid-1 not supported yet - get broker details type=LogBrokerTopicDetails - coming soon',
    );
  });

  it('should keep a sensitive payload out of retry and give-up logs', async () => {
    const errorLog = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    const secret = buildPublishMessage(
      PublishMessageKind.SENSITIVE,
      'testing',
      'key-s',
      null,
      'test-secret-payload',
    );
    broker.publishStatuses.push(PUBLISH_FAILED, PUBLISH_FAILED);
    queue.enqueue([secret, buildShutdownMessage()]);

    await createWorker(new FixedIntervalRetryPolicy(10, 2)).run();

    const described = `SENSITIVE PublishMessage id=${secret.id} kind=Sensitive topic=testing key=key-s headers=none`;
    const lines = errorLog.mock.calls.map(([line]) => String(line));
    expect(lines).toEqual([
      `test-wid-1 - failed to publish delivery status=-1 attempt=1 retrying in 10ms msg=${described}`,
      `test-wid-1 - giving up after 2 attempts delivery status=-1 msg=${described}`,
    ]);
    expect(broker.published).toEqual([]);
  });

  it('should stop without connecting when no broker is configured', async () => {
    config = buildTestConfig({ KAFKA_BROKERS: '' });
    const worker = createWorker();

    await worker.run();

    expect(worker.state).toBe(WorkerState.TERMINATED);
    expect(broker.connections).toEqual([]);
  });

  it('should stop when the broker cannot be reached', async () => {
    broker.connectError = new Error('unreachable');
    queue.enqueue([dataMessage(0)]);
    const worker = createWorker();

    await worker.run();

    expect(worker.state).toBe(WorkerState.TERMINATED);
    expect(broker.disconnects).toBe(0);
    expect(queue.size).toBe(1);
  });

  it('should leave an idle wait when woken', async () => {
    config = buildTestConfig({ KAFKA_PUBLISH_IDLE_INTERVAL_SEC: '60' });
    const worker = createWorker();
    const running = worker.run();
    await waitFor(() => worker.state === WorkerState.IDLE);

    queue.enqueue([buildShutdownMessage()]);
    signals.wakeIdleWorkers();
    await running;

    expect(worker.state).toBe(WorkerState.TERMINATED);
  });

  it('should abandon a retry wait when force-stopped', async () => {
    broker.publishStatuses.push(PUBLISH_FAILED);
    queue.enqueue([dataMessage(0), dataMessage(1)]);
    const running = createWorker(new FixedIntervalRetryPolicy(60000)).run();
    await waitFor(() => stats.snapshot().publishFailures === 1);

    signals.forceStop();
    await running;

    expect(broker.publishedPayloads()).toEqual([]);
    expect(stats.snapshot().dropped[DroppedMessageReason.FORCED_STOP]).toBe(
      2,
    );
  });
});
