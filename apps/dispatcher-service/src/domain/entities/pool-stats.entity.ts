import { DroppedMessageReason } from '@app/common';

export type DroppedMessageCounts = Record<DroppedMessageReason, number>;

export interface PoolStatsSnapshot {
  readonly published: number;
  readonly publishFailures: number;
  readonly requeuedShutdowns: number;
  readonly dropped: DroppedMessageCounts;
}

/**
 * Running counters shared by all workers of one pool.
 *
 * Drops are counted per reason so that every path where a drained message
 * never reaches the broker stays observable.
 */
export class PoolStats {
  private published = 0;
  private publishFailures = 0;
  private requeuedShutdowns = 0;
  private readonly dropped: DroppedMessageCounts = {
    [DroppedMessageReason.UNSUPPORTED_KIND]: 0,
    [DroppedMessageReason.NOT_SUPPORTED_YET]: 0,
    [DroppedMessageReason.SHUTDOWN_REMAINDER]: 0,
    [DroppedMessageReason.RETRIES_EXHAUSTED]: 0,
    [DroppedMessageReason.FORCED_STOP]: 0,
  };

  recordPublished(): void {
    this.published += 1;
  }

  recordPublishFailure(): void {
    this.publishFailures += 1;
  }

  recordRequeuedShutdown(): void {
    this.requeuedShutdowns += 1;
  }

  recordDropped(reason: DroppedMessageReason, count: number): void {
    if (count > 0) {
      this.dropped[reason] += count;
    }
  }

  get totalDropped(): number {
    return Object.values(this.dropped).reduce((sum, n) => sum + n, 0);
  }

  snapshot(): PoolStatsSnapshot {
    return {
      published: this.published,
      publishFailures: this.publishFailures,
      requeuedShutdowns: this.requeuedShutdowns,
      dropped: { ...this.dropped },
    };
  }
}
