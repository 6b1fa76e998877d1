import { shutdownTracing, startTracing, tracerOptionsFromEnv } from './tracer';

describe('tracer', () => {
  describe('tracerOptionsFromEnv', () => {
    it('falls back to the service defaults', () => {
      expect(tracerOptionsFromEnv({})).toEqual({
        enabled: true,
        serviceName: 'clinical-ingestion',
        serviceVersion: '1.0.0',
        environment: 'development',
        endpoint: 'http://localhost:4318/v1/traces',
      });
    });

    it('reads the service identity and exporter endpoint', () => {
      expect(
        tracerOptionsFromEnv({
          OTEL_TRACES_ENABLED: 'false',
          SERVICE_NAME: 'clinical-ingestion-worker',
          APP_VERSION: '2.3.0',
          NODE_ENV: 'production',
          OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector:4318/v1/traces',
        }),
      ).toEqual({
        enabled: false,
        serviceName: 'clinical-ingestion-worker',
        serviceVersion: '2.3.0',
        environment: 'production',
        endpoint: 'http://collector:4318/v1/traces',
      });
    });
  });

  it('does nothing when tracing is disabled or was never started', async () => {
    startTracing(tracerOptionsFromEnv({ OTEL_TRACES_ENABLED: 'false' }));

    await expect(shutdownTracing()).resolves.toBeUndefined();
  });
});
