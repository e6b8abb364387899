import {
  EmptyBatchError,
  PublishMessageKind,
  QueueLockError,
  buildPublishMessage,
  type PublishMessage,
} from '@app/common';
import { WorkQueue } from './work-queue';

function dataMessages(count: number): PublishMessage[] {
  return Array.from({ length: count }, (_, index) =>
    buildPublishMessage(
      PublishMessageKind.DATA,
      'testing',
      `key-${String(index)}`,
      null,
      `test message ${String(index)}`,
    ),
  );
}

function payloads(messages: PublishMessage[]): string[] {
  return messages.map((message) => message.payload.toString());
}

describe('WorkQueue', () => {
  let queue: WorkQueue;

  beforeEach(() => {
    queue = new WorkQueue();
  });

  it('should append in order and report the new length', () => {
    expect(queue.enqueue(dataMessages(100))).toBe(100);
    expect(queue.size).toBe(100);

    expect(payloads(queue.drain(3))).toEqual([
      'test message 0',
      'test message 1',
      'test message 2',
    ]);
    expect(queue.size).toBe(97);
  });

  it('should accept a batch of any length in one append', () => {
    const [message] = dataMessages(1);
    const batch = Array.from({ length: 250000 }, () => message);

    expect(queue.enqueue(batch)).toBe(250000);
    expect(queue.enqueue(dataMessages(1))).toBe(250001);
    expect(queue.drain(10)).toHaveLength(10);
    expect(queue.drainAll()).toHaveLength(249991);
  });

  it('should reject an empty batch and leave the queue unchanged', () => {
    queue.enqueue(dataMessages(2));

    expect(() => queue.enqueue([])).toThrow(EmptyBatchError);
    expect(() => queue.enqueue([])).toThrow('no msgs to add');
    expect(queue.size).toBe(2);
  });

  it('should drain at most the batch size per call', () => {
    queue.enqueue(dataMessages(15));

    expect(queue.drain(10)).toHaveLength(10);
    expect(payloads(queue.drain(10))).toEqual([
      'test message 10',
      'test message 11',
      'test message 12',
      'test message 13',
      'test message 14',
    ]);
    expect(queue.drain(10)).toEqual([]);
  });

  it('should drain 10 by default', () => {
    queue.enqueue(dataMessages(12));

    expect(queue.drain()).toHaveLength(10);
    expect(queue.size).toBe(2);
  });

  it('should empty the queue with drainAll', () => {
    queue.enqueue(dataMessages(25));

    expect(payloads(queue.drainAll())).toHaveLength(25);
    expect(queue.size).toBe(0);
    expect(queue.drainAll()).toEqual([]);
  });

  it('should refuse re-entrant access while the lock is held', () => {
    const [inner] = dataMessages(1);
    const [outer] = dataMessages(1);
    let nested: unknown = null;
    const batch = Object.defineProperty([outer], Symbol.iterator, {
      value: function* () {
        try {
          queue.enqueue([inner]);
        } catch (error) {
          nested = error;
        }
        yield outer;
      },
    });

    expect(queue.enqueue(batch)).toBe(1);
    expect(nested).toBeInstanceOf(QueueLockError);
    expect(nested).toHaveProperty(
      'message',
      'failed to get lock on work queue with err=lock already held',
    );
  });

  it('should poison the queue when a critical section fails', () => {
    queue.enqueue(dataMessages(4));
    const broken = Object.defineProperty(dataMessages(1), Symbol.iterator, {
      value: () => {
        throw new Error('iterator broke');
      },
    });

    expect(() => queue.enqueue(broken)).toThrow(
      'failed to get lock on work queue with err=iterator broke',
    );
    expect(() => queue.enqueue(dataMessages(1))).toThrow(
      'failed to get lock on work queue with err=poisoned by earlier failure: iterator broke',
    );
    expect(queue.drain()).toEqual([]);
    expect(queue.drainAll()).toEqual([]);
    expect(queue.size).toBe(4);
  });
});
