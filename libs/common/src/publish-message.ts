/**
 * Messages handed to the dispatch pool.
 *
 * A message is owned by the work queue while pending and by exactly one
 * worker's local batch while it is being processed.
 */

import { Expose, plainToInstance } from 'class-transformer';
import { v7 as uuidv7 } from 'uuid';
import { PublishMessageKind } from './constants';

export type MessageHeaders = Readonly<Record<string, string>>;

export type MessagePayload = string | Buffer;

interface PublishMessageProps {
  readonly id: string;
  readonly kind: PublishMessageKind;
  readonly topic: string;
  readonly key: string;
  readonly headers: MessageHeaders | null;
  readonly payload: MessagePayload;
}

export class PublishMessage {
  /** Correlates log lines for a message, including sensitive ones */
  @Expose()
  readonly id!: string;

  @Expose()
  readonly kind!: PublishMessageKind;

  @Expose()
  readonly topic!: string;

  /** Partition key */
  @Expose()
  readonly key!: string;

  @Expose()
  readonly headers!: MessageHeaders | null;

  @Expose()
  readonly payload!: MessagePayload;

  static create(props: PublishMessageProps): PublishMessage {
    return plainToInstance(PublishMessage, props, {
      excludeExtraneousValues: true,
    });
  }

  get isSensitive(): boolean {
    return this.kind === PublishMessageKind.SENSITIVE;
  }

  /**
   * Copy of this message with the same id, used when a shutdown message is
   * handed back to the queue for the other workers.
   */
  clone(): PublishMessage {
    return PublishMessage.create({
      id: this.id,
      kind: this.kind,
      topic: this.topic,
      key: this.key,
      headers: this.headers === null ? null : { ...this.headers },
      payload: Buffer.isBuffer(this.payload)
        ? Buffer.from(this.payload)
        : this.payload,
    });
  }

  /**
   * Log representation. Sensitive payloads are never included.
   */
  toString(): string {
    const headers =
      this.headers === null ? 'none' : JSON.stringify(this.headers);
    const summary =
      `id=${this.id} kind=${this.kind} topic=${this.topic} ` +
      `key=${this.key} headers=${headers}`;
    if (this.isSensitive) {
      return `SENSITIVE PublishMessage ${summary}`;
    }
    return `PublishMessage ${summary} payload=${this.payload.toString()}`;
  }
}

/**
 * Build a message with a fresh id.
 *
 * @param kind - How workers should handle the message
 * @param topic - Destination topic (ignored for shutdown messages)
 * @param key - Partition key
 * @param headers - Optional message headers
 * @param payload - Message body
 */
export function buildPublishMessage(
  kind: PublishMessageKind,
  topic: string,
  key: string,
  headers: MessageHeaders | null | undefined,
  payload: MessagePayload,
): PublishMessage {
  return PublishMessage.create({
    id: uuidv7(),
    kind,
    topic,
    key,
    headers: headers ?? null,
    payload,
  });
}

export function buildShutdownMessage(): PublishMessage {
  return buildPublishMessage(PublishMessageKind.SHUTDOWN, '', '', null, '');
}
