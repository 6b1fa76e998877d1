import { Global, Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, MySql2Database } from 'drizzle-orm/mysql2';
import { createPool, Pool, PoolOptions } from 'mysql2/promise';
import { readPositiveInt, toNumber } from '../shared/config/config.utils';
import * as schema from './schema';

export const DATABASE_POOL = 'DATABASE_POOL';
export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';

export type Database = MySql2Database<typeof schema>;

export function buildPoolOptions(configService: ConfigService): PoolOptions {
  return {
    host: configService.get<string>('DB_HOST', 'localhost'),
    port: toNumber(configService.get('DB_PORT'), 3306),
    user: configService.get<string>('DB_USER', 'root'),
    password: configService.get<string>('DB_PASSWORD', 'root'),
    database: configService.get<string>('DB_NAME', 'clinical_ingestion_db'),
    waitForConnections: true,
    // Every concurrent document holds at most one connection at a time.
    connectionLimit: Math.max(
      readPositiveInt(configService, 'DB_POOL_MAX', 10),
      readPositiveInt(configService, 'MAX_CONCURRENT_DOCUMENTS', 3) + 1,
    ),
    queueLimit: 0,
    charset: 'utf8mb4',
  };
}

@Global()
@Module({
  providers: [
    {
      provide: DATABASE_POOL,
      useFactory: (configService: ConfigService): Pool =>
        createPool(buildPoolOptions(configService)),
      inject: [ConfigService],
    },
    {
      provide: DATABASE_CONNECTION,
      useFactory: (pool: Pool): Database => drizzle(pool, { schema, mode: 'default' }),
      inject: [DATABASE_POOL],
    },
  ],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('MySQL pool closed');
  }
}
