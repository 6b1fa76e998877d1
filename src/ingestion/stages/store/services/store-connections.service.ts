import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type Keyv from 'keyv';
import type { Driver } from 'neo4j-driver';
import { NEO4J_DRIVER, PROFILE_STORE } from '../store.constants';
import type { PatientProfile } from '../types/store.types';

/**
 * Closes the long-lived backend connections this module opens.
 */
@Injectable()
export class StoreConnectionsService implements OnModuleDestroy {
  private readonly logger = new Logger(StoreConnectionsService.name);

  constructor(
    @Inject(NEO4J_DRIVER) private readonly driver: Driver,
    @Inject(PROFILE_STORE) private readonly profiles: Keyv<PatientProfile>,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await Promise.all([this.driver.close(), this.profiles.disconnect()]);
    this.logger.log('Closed graph and profile store connections');
  }
}
