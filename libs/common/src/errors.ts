/**
 * Errors surfaced by the work queue and broker clients.
 *
 * Queue errors are thrown back to the caller that tried to enqueue. Broker
 * errors stay inside the worker that hit them and are only logged.
 */

export abstract class PublishQueueError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown when enqueue is called without any messages. */
export class EmptyBatchError extends PublishQueueError {
  readonly code = 'EmptyBatch';

  constructor() {
    super('no msgs to add');
  }
}

/**
 * Thrown when the queue lock cannot be taken, either because a critical
 * section is already running or because an earlier one failed part-way.
 */
export class QueueLockError extends PublishQueueError {
  readonly code = 'LockFailure';

  constructor(reason: string) {
    super(`failed to get lock on work queue with err=${reason}`);
  }
}

/** No usable broker address was configured for a worker. */
export class BrokerUnavailableError extends PublishQueueError {
  readonly code = 'ConnectionUnavailable';

  constructor(brokers: readonly string[]) {
    super(`no brokers to connect to KAFKA_BROKERS=${JSON.stringify(brokers)}`);
  }
}

/** A broker request did not finish within its deadline. */
export class BrokerTimeoutError extends PublishQueueError {
  readonly code = 'BrokerTimeout';

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`);
  }
}
