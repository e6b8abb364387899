import { Module } from '@nestjs/common';
import { BROKER_CLIENT_FACTORY } from '../../domain/clients/broker.client';
import { KafkaBrokerClientFactory } from './kafka.broker-client.factory';

@Module({
  providers: [
    {
      provide: BROKER_CLIENT_FACTORY,
      useClass: KafkaBrokerClientFactory,
    },
  ],
  exports: [BROKER_CLIENT_FACTORY],
})
export class KafkaModule {}
