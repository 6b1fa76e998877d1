import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { toNumber } from '../shared/config/config.utils';
import { IngestionJobProducer } from './ingestion-job.producer';
import { INGESTION_QUEUE } from './queue.constants';

/**
 * Failed runs are resubmitted by the caller; the queue never retries.
 */
@Module({
  imports: [
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: toNumber(configService.get('REDIS_PORT'), 6379),
          password: configService.get<string>('REDIS_PASSWORD') || undefined,
          db: toNumber(configService.get('REDIS_DB'), 0),
        },
      }),
      inject: [ConfigService],
    }),
    BullModule.registerQueue({
      name: INGESTION_QUEUE,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: {
          count: 100,
          age: 3600,
        },
        removeOnFail: {
          count: 1000,
        },
      },
    }),
  ],
  providers: [IngestionJobProducer],
  exports: [IngestionJobProducer],
})
export class QueueModule {}
