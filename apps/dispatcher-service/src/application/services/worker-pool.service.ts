import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { WorkerState, createRetryPolicy, errorMessage } from '@app/common';
import { WORK_QUEUE, WorkQueue } from '../../domain/work-queue';
import {
  BROKER_CLIENT_FACTORY,
  type BrokerClientFactory,
} from '../../domain/clients/broker.client';
import { PoolSignals } from '../../domain/pool-signals';
import {
  PoolStats,
  type PoolStatsSnapshot,
} from '../../domain/entities/pool-stats.entity';
import {
  PUBLISHER_CONFIG,
  type PublisherConfig,
} from '../../config/publisher.config';
import { PublishWorker } from './publish-worker';
import { PublisherService } from './publisher.service';

export interface WorkerSnapshot {
  readonly label: string;
  readonly state: WorkerState;
}

export interface PoolSnapshot {
  readonly enabled: boolean;
  readonly workers: WorkerSnapshot[];
  readonly queueDepth: number;
  readonly stats: PoolStatsSnapshot;
}

/**
 * Owns the publish workers. They are started once the application has
 * bootstrapped and stopped before it shuts down: a shutdown message is queued
 * first, and workers still running after KAFKA_SHUTDOWN_TIMEOUT_MS are
 * force-stopped.
 */
@Injectable()
export class WorkerPoolService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(WorkerPoolService.name);
  private readonly signals = new PoolSignals();
  private readonly stats = new PoolStats();
  private workers: PublishWorker[] = [];
  private runs: Promise<void>[] = [];
  private started = false;

  constructor(
    @Inject(PUBLISHER_CONFIG) private readonly config: PublisherConfig,
    @Inject(WORK_QUEUE) private readonly queue: WorkQueue,
    @Inject(BROKER_CLIENT_FACTORY)
    private readonly clientFactory: BrokerClientFactory,
    private readonly publisher: PublisherService,
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  /**
   * Spawn `numWorkers` workers against the shared queue. Calling it again
   * returns the same publisher without spawning more.
   *
   * @returns The publisher handle for queueing messages
   */
  start(): PublisherService {
    if (this.started) {
      return this.publisher;
    }
    this.started = true;

    if (!this.config.isEnabled) {
      this.logger.log('kafka not enabled - no publish workers started');
      return this.publisher;
    }
    if (this.config.numWorkers === 0) {
      this.logger.error(
        `${this.config.label} - no workers to start KAFKA_NUM_WORKERS=0`,
      );
      return this.publisher;
    }

    const retryPolicy = createRetryPolicy({
      policy: this.config.retry.policy,
      intervalMs: this.config.retrySleepMs,
      maxAttempts: this.config.retry.maxAttempts,
      multiplier: this.config.retry.multiplier,
      maxIntervalMs: this.config.retry.maxIntervalMs,
    });

    for (let index = 0; index < this.config.numWorkers; index += 1) {
      const worker = new PublishWorker(index, {
        config: this.config,
        queue: this.queue,
        clientFactory: this.clientFactory,
        retryPolicy,
        signals: this.signals,
        stats: this.stats,
      });
      this.workers.push(worker);
      this.runs.push(
        worker.run().catch((error: unknown) => {
          this.logger.error(
            `${worker.label} - exited with err=${errorMessage(error)}`,
          );
        }),
      );
    }
    this.logger.log(
      `${this.config.label} - started ${String(this.workers.length)} publish workers`,
    );
    return this.publisher;
  }

  get isRunning(): boolean {
    return this.workers.some(
      (worker) => worker.state !== WorkerState.TERMINATED,
    );
  }

  snapshot(): PoolSnapshot {
    return {
      enabled: this.config.isEnabled,
      workers: this.workers.map((worker) => ({
        label: worker.label,
        state: worker.state,
      })),
      queueDepth: this.queue.size,
      stats: this.stats.snapshot(),
    };
  }

  /**
   * Wait for every worker to exit.
   *
   * @returns false when `timeoutMs` elapsed first
   */
  async whenStopped(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([
        Promise.all(this.runs).then(() => true),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Interrupt idle and retry waits so every worker exits promptly. */
  async forceStop(): Promise<void> {
    this.signals.forceStop();
    await Promise.all(this.runs);
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    this.logger.log(
      `stopping publish workers signal=${signal ?? 'none'} queue=${String(this.queue.size)}`,
    );
    try {
      this.publisher.shutdown();
    } catch (error) {
      this.logger.error(
        `failed to queue shutdown message: ${errorMessage(error)}`,
      );
    }

    const stopped = await this.whenStopped(this.config.shutdownTimeoutMs);
    if (!stopped) {
      this.logger.warn(
        `publish workers still running after ${String(this.config.shutdownTimeoutMs)}ms - forcing stop`,
      );
      await this.forceStop();
    }

    const { published, dropped } = this.stats.snapshot();
    this.logger.log(
      `publish workers stopped published=${String(published)} dropped=${JSON.stringify(dropped)} left in queue=${String(this.queue.size)}`,
    );
  }
}
