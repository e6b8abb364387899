import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { PublisherController } from './interface/http/publisher.controller';
import { PublisherService } from './application/services/publisher.service';
import { MetadataService } from './application/services/metadata.service';
import { WorkerPoolService } from './application/services/worker-pool.service';
import { PoolStatsReporter } from './application/services/pool-stats.reporter';
import { KafkaModule } from './infrastructure/messaging/kafka.module';
import { WORK_QUEUE, WorkQueue } from './domain/work-queue';
import {
  PUBLISHER_CONFIG,
  buildPublisherConfig,
  validateEnvironment,
} from './config/publisher.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    ScheduleModule.forRoot(),
    KafkaModule,
  ],
  controllers: [PublisherController],
  providers: [
    PublisherService,
    MetadataService,
    WorkerPoolService,
    PoolStatsReporter,
    {
      provide: PUBLISHER_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildPublisherConfig(configService),
    },
    {
      provide: WORK_QUEUE,
      useFactory: () => new WorkQueue(),
    },
  ],
  exports: [PublisherService, WorkerPoolService],
})
export class AppModule {}
