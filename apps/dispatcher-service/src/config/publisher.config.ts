import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { BackOffPolicy } from 'typescript-retry-decorator';
import {
  DEFAULT_DRAIN_BATCH_SIZE,
  MIN_SLEEP_INTERVAL_MS,
  splitCommaList,
} from '@app/common';

export const PUBLISHER_CONFIG = Symbol('PUBLISHER_CONFIG');

const ENABLED_VALUES = ['true', '1'];

/**
 * Environment variables read at startup. Anything missing falls back to the
 * defaults applied in {@link buildPublisherConfig}.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  KAFKA_ENABLED?: string;

  @IsOptional()
  @IsString()
  KAFKA_LOG_LABEL?: string;

  @IsOptional()
  @IsString()
  KAFKA_CLIENT_ID?: string;

  @IsOptional()
  @IsString()
  KAFKA_BROKERS?: string;

  @IsOptional()
  @IsString()
  KAFKA_TOPICS?: string;

  @IsOptional()
  @IsInt()
  @Min(1, { message: 'KAFKA_NUM_WORKERS must be a number between 1-100' })
  @Max(100, { message: 'KAFKA_NUM_WORKERS must be a number between 1-100' })
  KAFKA_NUM_WORKERS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0.002, {
    message:
      'KAFKA_PUBLISH_RETRY_INTERVAL_SEC must be a positive float between [0.002, inf]',
  })
  KAFKA_PUBLISH_RETRY_INTERVAL_SEC?: number;

  @IsOptional()
  @IsNumber()
  @Min(0.002, {
    message:
      'KAFKA_PUBLISH_IDLE_INTERVAL_SEC must be a positive float between [0.002, inf]',
  })
  KAFKA_PUBLISH_IDLE_INTERVAL_SEC?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  KAFKA_PUBLISH_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsEnum(BackOffPolicy)
  KAFKA_PUBLISH_BACKOFF_POLICY?: BackOffPolicy;

  @IsOptional()
  @IsNumber()
  @Min(1)
  KAFKA_PUBLISH_BACKOFF_MULTIPLIER?: number;

  @IsOptional()
  @IsNumber()
  @Min(0.002)
  KAFKA_PUBLISH_MAX_RETRY_INTERVAL_SEC?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  KAFKA_DRAIN_BATCH_SIZE?: number;

  @IsOptional()
  @IsString()
  KAFKA_TLS_CLIENT_KEY?: string;

  @IsOptional()
  @IsString()
  KAFKA_TLS_CLIENT_CERT?: string;

  @IsOptional()
  @IsString()
  KAFKA_TLS_CLIENT_CA?: string;

  @IsOptional()
  @IsIn(['true', 'false', '1', '0'])
  KAFKA_METADATA_COUNT_MSG_OFFSETS?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  KAFKA_SHUTDOWN_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  KAFKA_STATS_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  PORT?: number;
}

/**
 * Validate raw environment values for `ConfigModule.forRoot({ validate })`.
 * Numeric settings arrive as strings and are converted from their declared types.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const reasons = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid publisher configuration: ${reasons.join('; ')}`);
  }
  return validated;
}

export interface TlsMaterial {
  readonly key: string;
  readonly cert: string;
  readonly ca: string;
}

export interface PublishRetrySettings {
  readonly policy: BackOffPolicy;
  /** 0 retries forever */
  readonly maxAttempts: number;
  readonly multiplier: number;
  readonly maxIntervalMs: number;
}

/**
 * Immutable settings shared read-only by the facade and every worker.
 */
export interface PublisherConfig {
  readonly label: string;
  readonly isEnabled: boolean;
  readonly clientId: string;
  readonly brokerList: readonly string[];
  readonly publishTopics: ReadonlySet<string>;
  readonly numWorkers: number;
  readonly retrySleepMs: number;
  readonly idleSleepMs: number;
  readonly drainBatchSize: number;
  readonly retry: PublishRetrySettings;
  /** All empty means plaintext transport */
  readonly tls: TlsMaterial;
  readonly countMessageOffsets: boolean;
  readonly shutdownTimeoutMs: number;
  readonly statsIntervalMs: number;
}

/**
 * Build the publisher configuration from validated environment values.
 *
 * @param configService - Source of the validated environment
 * @param label - Overrides KAFKA_LOG_LABEL when given
 */
export function buildPublisherConfig(
  configService: ConfigService,
  label?: string,
): PublisherConfig {
  const useLabel =
    label ?? configService.get<string>('KAFKA_LOG_LABEL', 'kdp');
  const isEnabled = ENABLED_VALUES.includes(
    configService.get<string>('KAFKA_ENABLED', 'true').toLowerCase(),
  );

  const retrySleepMs = toMillis(
    configService.get<number>('KAFKA_PUBLISH_RETRY_INTERVAL_SEC', 1),
  );
  const idleSleepMs = toMillis(
    configService.get<number>('KAFKA_PUBLISH_IDLE_INTERVAL_SEC', 0.5),
  );
  if (retrySleepMs <= MIN_SLEEP_INTERVAL_MS) {
    throw new Error(
      `please use a positive float for the retry sleep interval KAFKA_PUBLISH_RETRY_INTERVAL_SEC=${String(retrySleepMs)}ms`,
    );
  }
  if (idleSleepMs <= MIN_SLEEP_INTERVAL_MS) {
    throw new Error(
      `please use a positive float for the idle sleep interval KAFKA_PUBLISH_IDLE_INTERVAL_SEC=${String(idleSleepMs)}ms`,
    );
  }

  const topics = splitCommaList(
    configService.get<string>('KAFKA_TOPICS', ''),
  ).filter((topic) => topic.length > 0);

  return Object.freeze({
    label: useLabel,
    isEnabled,
    clientId: configService.get<string>('KAFKA_CLIENT_ID', useLabel),
    brokerList: Object.freeze(
      splitCommaList(configService.get<string>('KAFKA_BROKERS', '')),
    ),
    publishTopics: new Set(topics),
    numWorkers: isEnabled
      ? configService.get<number>('KAFKA_NUM_WORKERS', 5)
      : 0,
    retrySleepMs,
    idleSleepMs,
    drainBatchSize: configService.get<number>(
      'KAFKA_DRAIN_BATCH_SIZE',
      DEFAULT_DRAIN_BATCH_SIZE,
    ),
    retry: Object.freeze({
      policy: configService.get<BackOffPolicy>(
        'KAFKA_PUBLISH_BACKOFF_POLICY',
        BackOffPolicy.FixedBackOffPolicy,
      ),
      maxAttempts: configService.get<number>('KAFKA_PUBLISH_MAX_ATTEMPTS', 0),
      multiplier: configService.get<number>(
        'KAFKA_PUBLISH_BACKOFF_MULTIPLIER',
        2,
      ),
      maxIntervalMs: toMillis(
        configService.get<number>('KAFKA_PUBLISH_MAX_RETRY_INTERVAL_SEC', 30),
      ),
    }),
    tls: Object.freeze({
      key: configService.get<string>('KAFKA_TLS_CLIENT_KEY', ''),
      cert: configService.get<string>('KAFKA_TLS_CLIENT_CERT', ''),
      ca: configService.get<string>('KAFKA_TLS_CLIENT_CA', ''),
    }),
    countMessageOffsets: ENABLED_VALUES.includes(
      configService.get<string>('KAFKA_METADATA_COUNT_MSG_OFFSETS', 'true'),
    ),
    shutdownTimeoutMs: configService.get<number>(
      'KAFKA_SHUTDOWN_TIMEOUT_MS',
      10000,
    ),
    statsIntervalMs: configService.get<number>('KAFKA_STATS_INTERVAL_MS', 0),
  });
}

export function hasTlsMaterial(tls: TlsMaterial): boolean {
  return tls.key !== '' || tls.cert !== '' || tls.ca !== '';
}

/**
 * One-line summary for logs. TLS paths are shown, never file contents.
 */
export function describePublisherConfig(config: PublisherConfig): string {
  return (
    `PublisherConfig label=${config.label} enabled=${String(config.isEnabled)} ` +
    `tls key=${config.tls.key} cert=${config.tls.cert} ca=${config.tls.ca} ` +
    `retry_sleep=${String(config.retrySleepMs)}ms idle_sleep=${String(config.idleSleepMs)}ms ` +
    `workers=${String(config.numWorkers)} brokers=${JSON.stringify(config.brokerList)} ` +
    `topics=${JSON.stringify([...config.publishTopics])}`
  );
}

function toMillis(seconds: number): number {
  return Math.trunc(seconds * 1000);
}
