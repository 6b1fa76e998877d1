import { Logger } from '@nestjs/common';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';

export interface TracerOptions {
  enabled: boolean;
  serviceName: string;
  serviceVersion: string;
  environment: string;
  endpoint: string;
}

const logger = new Logger('Tracing');
let activeSdk: NodeSDK | null = null;

export function tracerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): TracerOptions {
  return {
    enabled: env.OTEL_TRACES_ENABLED !== 'false',
    serviceName: env.SERVICE_NAME || 'clinical-ingestion',
    serviceVersion: env.APP_VERSION || '1.0.0',
    environment: env.NODE_ENV || 'development',
    endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
  };
}

/**
 * Starts the process-wide SDK once, before the application is created.
 */
export function startTracing(options: TracerOptions): void {
  if (!options.enabled || activeSdk) {
    return;
  }

  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: options.serviceName,
      [ATTR_SERVICE_VERSION]: options.serviceVersion,
      'deployment.environment': options.environment,
      'service.namespace': 'clinical-pipeline',
    }),
    spanProcessors: [
      new BatchSpanProcessor(new OTLPTraceExporter({ url: options.endpoint })),
    ],
    instrumentations: [
      getNodeAutoInstrumentations({
        // Page rasterising and temp-file cleanup would flood traces with fs spans.
        '@opentelemetry/instrumentation-fs': { enabled: false },
        '@opentelemetry/instrumentation-dns': { enabled: false },
        '@opentelemetry/instrumentation-net': { enabled: false },
        '@opentelemetry/instrumentation-http': { enabled: true },
        '@opentelemetry/instrumentation-undici': { enabled: true },
        '@opentelemetry/instrumentation-nestjs-core': { enabled: true },
        '@opentelemetry/instrumentation-mysql2': { enabled: true },
        '@opentelemetry/instrumentation-ioredis': { enabled: true },
      }),
    ],
  });

  sdk.start();
  activeSdk = sdk;
  logger.log(`Tracing ${options.serviceName} to ${options.endpoint}`);
}

/**
 * Flushes pending spans. Safe to call when tracing never started.
 */
export async function shutdownTracing(): Promise<void> {
  const sdk = activeSdk;
  if (!sdk) {
    return;
  }
  activeSdk = null;

  try {
    await sdk.shutdown();
    logger.log('Tracing shut down');
  } catch (error: unknown) {
    logger.error(
      'Error shutting down tracing',
      error instanceof Error ? error.stack : String(error),
    );
  }
}
