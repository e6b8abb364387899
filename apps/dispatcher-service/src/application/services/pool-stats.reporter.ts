import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  PUBLISHER_CONFIG,
  type PublisherConfig,
} from '../../config/publisher.config';
import { WorkerPoolService } from './worker-pool.service';

export const POOL_STATS_INTERVAL = 'pool-stats';

/**
 * Periodically logs worker states, queue depth and publish counters.
 * Registered only when KAFKA_STATS_INTERVAL_MS is above zero.
 */
@Injectable()
export class PoolStatsReporter
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(PoolStatsReporter.name);

  constructor(
    @Inject(PUBLISHER_CONFIG) private readonly config: PublisherConfig,
    private readonly pool: WorkerPoolService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.config.isEnabled || this.config.statsIntervalMs <= 0) {
      return;
    }
    const interval = setInterval(() => {
      this.report();
    }, this.config.statsIntervalMs);
    this.schedulerRegistry.addInterval(POOL_STATS_INTERVAL, interval);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', POOL_STATS_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(POOL_STATS_INTERVAL);
    }
  }

  report(): void {
    const { workers, queueDepth, stats } = this.pool.snapshot();
    const states = workers
      .map((worker) => `${worker.label}=${worker.state}`)
      .join(' ');
    this.logger.log(
      `${this.config.label} - queue=${String(queueDepth)} published=${String(stats.published)} ` +
        `failures=${String(stats.publishFailures)} dropped=${JSON.stringify(stats.dropped)} ${states}`,
    );
  }
}
