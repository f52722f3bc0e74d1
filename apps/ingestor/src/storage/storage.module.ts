import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { readOptionalString } from '../config/config.helpers';
import { IngestionRepository } from './ingestion.repository';
import { InMemoryIngestionRepository } from './in-memory-ingestion.repository';
import { PostgresIngestionRepository } from './postgres-ingestion.repository';

/**
 * Postgres when DATABASE_URL is set, the in-process store otherwise
 */
export function createIngestionRepository(config: ConfigService): IngestionRepository {
  const logger = new Logger('StorageModule');
  const databaseUrl = readOptionalString(config, 'DATABASE_URL');
  if (!databaseUrl) {
    logger.warn('DATABASE_URL is not set; using the in-memory store (data is lost on restart)');
    return new InMemoryIngestionRepository();
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  logger.log('Using Postgres store');
  return new PostgresIngestionRepository(pool);
}

@Global()
@Module({
  providers: [
    {
      provide: IngestionRepository,
      useFactory: createIngestionRepository,
      inject: [ConfigService],
    },
  ],
  exports: [IngestionRepository],
})
export class StorageModule {}
