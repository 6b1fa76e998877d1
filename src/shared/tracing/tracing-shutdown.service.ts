import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { shutdownTracing } from './tracer';

/**
 * Flushes spans as the last shutdown step, after modules have closed their
 * connections and the queue worker has drained.
 */
@Injectable()
export class TracingShutdownService implements OnApplicationShutdown {
  async onApplicationShutdown(): Promise<void> {
    await shutdownTracing();
  }
}
