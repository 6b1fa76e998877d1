import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { Logger } from 'nestjs-pino';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { toNumber } from './shared/config/config.utils';
import { startTracing, tracerOptionsFromEnv } from './shared/tracing/tracer';

startTracing(tracerOptionsFromEnv());

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  // SIGTERM/SIGINT close the app: the worker drains, connections close, spans flush.
  app.enableShutdownHooks();
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);
  const tcpPort = toNumber(configService.get('TCP_PORT'), 4010);

  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: configService.get<string>('TCP_HOST', 'localhost'),
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`Ingestion TCP patterns listening on port ${tcpPort}`);

  const port = toNumber(configService.get('PORT'), 50060);
  await app.listen(port);
  logger.log(`Clinical ingestion service is running on http://localhost:${port}`);
}

void bootstrap();
