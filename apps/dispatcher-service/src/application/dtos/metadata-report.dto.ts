import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, MinLength } from 'class-validator';

const QUERY_BOOLEANS: Record<string, boolean> = {
  true: true,
  '1': true,
  false: false,
  '0': false,
};

export class MetadataQueryDto {
  @IsOptional()
  @IsString()
  @MinLength(1)
  topic?: string;

  /** Defaults to KAFKA_METADATA_COUNT_MSG_OFFSETS */
  @IsOptional()
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' && Object.hasOwn(QUERY_BOOLEANS, value)
      ? QUERY_BOOLEANS[value]
      : value,
  )
  @IsBoolean()
  offsets?: boolean;
}

export interface WatermarksReport {
  readonly low: number;
  readonly high: number;
}

export interface PartitionReport {
  readonly id: number;
  readonly leader: number;
  readonly replicas: number[];
  readonly isr: number[];
  readonly error: string | null;
  /** null when offsets were not requested */
  readonly watermarks: WatermarksReport | null;
}

export interface TopicReport {
  readonly name: string;
  readonly error: string | null;
  readonly partitions: PartitionReport[];
  /** Sum of high - low across partitions; null when offsets were not requested */
  readonly messageCount: number | null;
}

export interface ClusterMetadataReport {
  readonly brokers: { id: number; host: string; port: number }[];
  readonly topics: TopicReport[];
}
