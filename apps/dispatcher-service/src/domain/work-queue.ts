import { Logger } from '@nestjs/common';
import {
  DEFAULT_DRAIN_BATCH_SIZE,
  EmptyBatchError,
  QueueLockError,
  errorMessage,
  type PublishMessage,
} from '@app/common';

export const WORK_QUEUE = Symbol('WORK_QUEUE');

/**
 * FIFO of messages waiting to be published, shared by the facade and every
 * worker.
 *
 * All access goes through a single critical section. Critical sections are
 * synchronous, so the lock is never held across broker I/O or sleeps. If one
 * of them throws part-way, the queue is poisoned and every later operation
 * fails with {@link QueueLockError} instead of working on a half-updated list.
 */
export class WorkQueue {
  private readonly logger = new Logger(WorkQueue.name);
  private readonly items: PublishMessage[] = [];
  private locked = false;
  private poisonedBy: string | null = null;

  /** Readable even after the queue is poisoned. */
  get size(): number {
    return this.items.length;
  }

  /**
   * Append messages in order.
   *
   * @returns Number of messages in the queue after the append
   * @throws EmptyBatchError when `messages` is empty
   * @throws QueueLockError when the lock cannot be taken
   */
  enqueue(messages: readonly PublishMessage[]): number {
    if (messages.length === 0) {
      const error = new EmptyBatchError();
      this.logger.error(error.message);
      throw error;
    }
    return this.withLock((items) => {
      for (const message of messages) {
        items.push(message);
      }
      return items.length;
    });
  }

  /**
   * Remove up to `maxBatch` messages from the front, oldest first.
   *
   * Lock failures are logged and reported as an empty batch.
   */
  drain(maxBatch = DEFAULT_DRAIN_BATCH_SIZE): PublishMessage[] {
    try {
      return this.withLock((items) =>
        items.splice(0, Math.min(maxBatch, items.length)),
      );
    } catch (error) {
      this.logger.error(errorMessage(error));
      return [];
    }
  }

  /**
   * Remove every pending message, bypassing the workers.
   */
  drainAll(): PublishMessage[] {
    try {
      return this.withLock((items) => items.splice(0, items.length));
    } catch (error) {
      this.logger.error(errorMessage(error));
      return [];
    }
  }

  private withLock<T>(critical: (items: PublishMessage[]) => T): T {
    if (this.poisonedBy !== null) {
      throw new QueueLockError(`poisoned by earlier failure: ${this.poisonedBy}`);
    }
    if (this.locked) {
      throw new QueueLockError('lock already held');
    }
    this.locked = true;
    try {
      return critical(this.items);
    } catch (error) {
      this.poisonedBy = errorMessage(error);
      throw new QueueLockError(this.poisonedBy);
    } finally {
      this.locked = false;
    }
  }
}
