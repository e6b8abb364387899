// Publish message kinds
export enum PublishMessageKind {
  DATA = 'Data',
  SENSITIVE = 'Sensitive',
  SHUTDOWN = 'Shutdown',
  LOG_BROKER_DETAILS = 'LogBrokerDetails',
  LOG_BROKER_TOPIC_DETAILS = 'LogBrokerTopicDetails',
}

// Worker lifecycle states
export enum WorkerState {
  CONNECTING = 'Connecting',
  DRAINING = 'Draining',
  IDLE = 'Idle',
  PUBLISHING = 'Publishing',
  SHUTTING_DOWN = 'ShuttingDown',
  TERMINATED = 'Terminated',
}

// Reasons a drained message never reached the broker
export enum DroppedMessageReason {
  UNSUPPORTED_KIND = 'UnsupportedMessageKind',
  NOT_SUPPORTED_YET = 'NotSupportedYet',
  SHUTDOWN_REMAINDER = 'ShutdownRemainder',
  RETRIES_EXHAUSTED = 'RetriesExhausted',
  FORCED_STOP = 'ForcedStop',
}

/** Delivery status reported by a broker client for a successful publish */
export const PUBLISH_SUCCESS = 0;

/** Delivery status used when a publish failed without a broker error code */
export const PUBLISH_FAILED = -1;

/** Maximum number of messages a worker drains per iteration */
export const DEFAULT_DRAIN_BATCH_SIZE = 10;

/** Timeout for a cluster metadata fetch (ms) */
export const METADATA_FETCH_TIMEOUT_MS = 30000;

/** Timeout for a single partition watermark fetch (ms) */
export const WATERMARK_FETCH_TIMEOUT_MS = 1000;

/** Watermarks reported when a partition's offsets could not be fetched */
export const UNKNOWN_WATERMARKS = { low: -1, high: -1 } as const;

/** Sleep intervals at or below this value are rejected to avoid busy-spinning (ms) */
export const MIN_SLEEP_INTERVAL_MS = 1;

export const SHUTDOWN_STARTED = 'shutdown started';
export const KAFKA_NOT_ENABLED = 'kafka not enabled';
