import {
  BadGatewayException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  PublishMessageKind,
  QueueLockError,
  buildPublishMessage,
  errorMessage,
  type PublishMessage,
} from '@app/common';
import { PublisherService } from '../../application/services/publisher.service';
import {
  WorkerPoolService,
  type PoolSnapshot,
} from '../../application/services/worker-pool.service';
import {
  AddMessageDto,
  AddMessagesDto,
  type QueuedResponseDto,
  type ShutdownResponseDto,
} from '../../application/dtos/add-message.dto';
import {
  MetadataQueryDto,
  type ClusterMetadataReport,
} from '../../application/dtos/metadata-report.dto';

function toPublishMessage(dto: AddMessageDto): PublishMessage {
  return buildPublishMessage(
    dto.sensitive === true
      ? PublishMessageKind.SENSITIVE
      : PublishMessageKind.DATA,
    dto.topic,
    dto.key,
    dto.headers,
    dto.payload,
  );
}

@Controller('publisher')
export class PublisherController {
  private readonly logger = new Logger(PublisherController.name);

  constructor(
    private readonly publisher: PublisherService,
    private readonly pool: WorkerPoolService,
  ) {}

  /**
   * Queue one message.
   * POST /publisher/messages
   */
  @Post('messages')
  @HttpCode(HttpStatus.ACCEPTED)
  addMessage(@Body() dto: AddMessageDto): QueuedResponseDto {
    const message = toPublishMessage(dto);
    return { queued: this.enqueue(() => this.publisher.addMessage(message)) };
  }

  /**
   * Queue a batch in one append; relative order is kept.
   * POST /publisher/messages/batch
   */
  @Post('messages/batch')
  @HttpCode(HttpStatus.ACCEPTED)
  addMessages(@Body() dto: AddMessagesDto): QueuedResponseDto {
    const messages = dto.messages.map(toPublishMessage);
    return { queued: this.enqueue(() => this.publisher.addMessages(messages)) };
  }

  /**
   * Ask the workers to stop once they reach the shutdown message.
   * POST /publisher/shutdown
   */
  @Post('shutdown')
  @HttpCode(HttpStatus.ACCEPTED)
  shutdown(): ShutdownResponseDto {
    return { result: this.enqueue(() => this.publisher.shutdown()) };
  }

  /**
   * GET /publisher/metadata
   * GET /publisher/metadata?topic=testing&offsets=false
   */
  @Get('metadata')
  async getMetadata(
    @Query() query: MetadataQueryDto,
  ): Promise<ClusterMetadataReport> {
    if (!this.publisher.isEnabled) {
      throw new ServiceUnavailableException('kafka not enabled');
    }
    const fetchOffsets =
      query.offsets ?? this.publisher.config.countMessageOffsets;
    let report: ClusterMetadataReport | null;
    try {
      report = await this.publisher.getMetadata(fetchOffsets, query.topic);
    } catch (error) {
      this.logger.error(`metadata request failed: ${errorMessage(error)}`);
      throw new BadGatewayException(errorMessage(error));
    }
    if (report === null) {
      throw new ServiceUnavailableException('kafka not enabled');
    }
    return report;
  }

  /**
   * Worker states, queue depth and publish counters.
   * GET /publisher/pool
   */
  @Get('pool')
  getPool(): PoolSnapshot {
    return this.pool.snapshot();
  }

  private enqueue<T>(append: () => T): T {
    try {
      return append();
    } catch (error) {
      if (error instanceof QueueLockError) {
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }
}
