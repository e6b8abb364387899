import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsObject,
  IsOptional,
  IsString,
  MinLength,
  Validate,
  ValidateNested,
  ValidatorConstraint,
} from 'class-validator';
import type { ValidatorConstraintInterface } from 'class-validator';

@ValidatorConstraint({ name: 'stringRecord', async: false })
class StringRecordConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return (
      typeof value === 'object' &&
      value !== null &&
      Object.values(value).every((entry) => typeof entry === 'string')
    );
  }

  defaultMessage(): string {
    return 'headers must map header names to string values';
  }
}

/**
 * Request DTO for queueing one message.
 */
export class AddMessageDto {
  @IsString()
  @MinLength(1)
  topic!: string;

  @IsString()
  key!: string;

  @IsOptional()
  @IsObject()
  @Validate(StringRecordConstraint)
  headers?: Record<string, string>;

  @IsString()
  payload!: string;

  /** Queue as a Sensitive message: the payload never appears in logs */
  @IsOptional()
  @IsBoolean()
  sensitive?: boolean;
}

export class AddMessagesDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => AddMessageDto)
  messages!: AddMessageDto[];
}

export interface QueuedResponseDto {
  /** Queue length after the append; 0 when publishing is disabled */
  readonly queued: number;
}

export interface ShutdownResponseDto {
  /** 'shutdown started' or 'kafka not enabled' */
  readonly result: string;
}
