import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { VocabularyModule } from './common/vocabulary/vocabulary.module';
import { DatabaseModule } from './database/database.module';
import { IdentityModule } from './identity/identity.module';
import { IngestionModule } from './ingestion/ingestion.module';
import { pinoConfig } from './shared/logging/pino.config';
import { TracingShutdownService } from './shared/tracing/tracing-shutdown.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRoot(pinoConfig),
    DatabaseModule,
    IdentityModule,
    VocabularyModule,
    IngestionModule,
  ],
  providers: [TracingShutdownService],
})
export class AppModule {}
