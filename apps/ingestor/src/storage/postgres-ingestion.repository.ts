import { Logger, OnApplicationShutdown } from '@nestjs/common';
import { QueryResult, QueryResultRow } from 'pg';
import {
  FetchedPrice,
  IngestionCheckpoint,
  JobRun,
  JobRunCompletion,
  JobRunStatus,
  JobRunTrigger,
  NewCheckpoint,
  PriceObservation,
  PriceSource,
  CheckpointStatus,
} from '../interfaces';
import { IngestionRepository, IngestionTransaction } from './ingestion.repository';

interface PgQueryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface PgPoolClient extends PgQueryable {
  release(): void;
}

/**
 * The part of pg's Pool the repository relies on
 */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgPoolClient>;
  end(): Promise<void>;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

interface ObservationRow {
  id: number;
  symbol: string;
  price_usd: number;
  source: string;
  timestamp: Date;
}

interface CheckpointRow {
  id: number;
  source_file: string;
  file_hash: string;
  status: string;
  created_at: Date;
}

interface JobRunRow {
  id: number;
  run_time: Date;
  status: string;
  records_processed: number;
  duration_ms: number | null;
  error_message: string | null;
  trigger_type: string;
}

const JOB_RUN_COLUMNS =
  'id, run_time, status, records_processed, duration_ms, error_message, trigger_type';

const JOB_RUN_STATUSES: readonly JobRunStatus[] = [
  'running',
  'success',
  'partial_failure',
  'failure',
  'failed',
];
const JOB_RUN_TRIGGERS: readonly JobRunTrigger[] = ['scheduled', 'live', 'batch'];
const PRICE_SOURCES: readonly PriceSource[] = Object.values(PriceSource);
const CHECKPOINT_STATUSES: readonly CheckpointStatus[] = ['success', 'failed'];

function pick<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new Error(`Unexpected ${column} value in store: ${value}`);
  }
  return found;
}

function toJobRun(row: JobRunRow): JobRun {
  return {
    id: row.id,
    runTime: row.run_time,
    status: pick(JOB_RUN_STATUSES, row.status, 'etl_jobs.status'),
    recordsProcessed: row.records_processed,
    durationMs: row.duration_ms,
    errorMessage: row.error_message,
    trigger: pick(JOB_RUN_TRIGGERS, row.trigger_type, 'etl_jobs.trigger_type'),
  };
}

function toObservation(row: ObservationRow): PriceObservation {
  return {
    id: row.id,
    symbol: row.symbol,
    priceUsd: row.price_usd,
    source: pick(PRICE_SOURCES, row.source, 'crypto_prices.source'),
    timestamp: row.timestamp,
  };
}

function toCheckpoint(row: CheckpointRow): IngestionCheckpoint {
  return {
    id: row.id,
    sourceName: row.source_file,
    contentHash: row.file_hash,
    status: pick(CHECKPOINT_STATUSES, row.status, 'ingestion_checkpoints.status'),
    createdAt: row.created_at,
  };
}

/**
 * Postgres-backed store. Expects the tables from sql/schema.sql to exist.
 */
export class PostgresIngestionRepository
  extends IngestionRepository
  implements OnApplicationShutdown
{
  private readonly logger = new Logger(PostgresIngestionRepository.name);

  constructor(private readonly pool: PgPool) {
    super();
    this.pool.on('error', (error: Error) => {
      this.logger.error(`Postgres pool error: ${error.message}`);
    });
  }

  async withTransaction<T>(work: (tx: IngestionTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await work(this.transactionFor(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.error(
          `Postgres rollback failed: ${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
        );
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async createJobRun(trigger: JobRunTrigger, runTime: Date): Promise<JobRun> {
    const result = await this.pool.query<JobRunRow>(
      `INSERT INTO etl_jobs (run_time, status, records_processed, trigger_type)
       VALUES ($1, 'running', 0, $2)
       RETURNING ${JOB_RUN_COLUMNS}`,
      [runTime, trigger],
    );
    return toJobRun(result.rows[0]);
  }

  async completeJobRun(id: number, completion: JobRunCompletion): Promise<JobRun | null> {
    const result = await this.pool.query<JobRunRow>(
      `UPDATE etl_jobs
       SET status = $2, records_processed = $3, duration_ms = $4, error_message = $5
       WHERE id = $1 AND status = 'running'
       RETURNING ${JOB_RUN_COLUMNS}`,
      [id, completion.status, completion.recordsProcessed, completion.durationMs, completion.errorMessage],
    );
    return result.rows.length > 0 ? toJobRun(result.rows[0]) : null;
  }

  async findSuccessfulCheckpoint(contentHash: string): Promise<IngestionCheckpoint | null> {
    const result = await this.pool.query<CheckpointRow>(
      `SELECT id, source_file, file_hash, status, created_at
       FROM ingestion_checkpoints
       WHERE file_hash = $1 AND status = 'success'
       ORDER BY id
       LIMIT 1`,
      [contentHash],
    );
    return result.rows.length > 0 ? toCheckpoint(result.rows[0]) : null;
  }

  async listObservations(offset: number, limit: number): Promise<PriceObservation[]> {
    const result = await this.pool.query<ObservationRow>(
      `SELECT id, symbol, price_usd, source, timestamp
       FROM crypto_prices
       ORDER BY timestamp DESC, id DESC
       LIMIT $1 OFFSET $2`,
      [limit, offset],
    );
    return result.rows.map(toObservation);
  }

  async countObservations(): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM crypto_prices',
    );
    return result.rows[0].count;
  }

  async listJobRuns(limit: number): Promise<JobRun[]> {
    const result = await this.pool.query<JobRunRow>(
      `SELECT ${JOB_RUN_COLUMNS}
       FROM etl_jobs
       ORDER BY run_time DESC, id DESC
       LIMIT $1`,
      [limit],
    );
    return result.rows.map(toJobRun);
  }

  async findLatestCompletedJobRun(): Promise<JobRun | null> {
    const result = await this.pool.query<JobRunRow>(
      `SELECT ${JOB_RUN_COLUMNS}
       FROM etl_jobs
       WHERE status <> 'running'
       ORDER BY run_time DESC, id DESC
       LIMIT 1`,
    );
    return result.rows.length > 0 ? toJobRun(result.rows[0]) : null;
  }

  async listSuccessfulJobRuns(excludeId: number, limit: number): Promise<JobRun[]> {
    const result = await this.pool.query<JobRunRow>(
      `SELECT ${JOB_RUN_COLUMNS}
       FROM etl_jobs
       WHERE status = 'success' AND id <> $1
       ORDER BY run_time DESC, id DESC
       LIMIT $2`,
      [excludeId, limit],
    );
    return result.rows.map(toJobRun);
  }

  async countJobRuns(statuses?: JobRunStatus[]): Promise<number> {
    const result = statuses
      ? await this.pool.query<{ count: number }>(
          'SELECT COUNT(*)::int AS count FROM etl_jobs WHERE status = ANY($1)',
          [statuses],
        )
      : await this.pool.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM etl_jobs');
    return result.rows[0].count;
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('Postgres pool closed');
  }

  private transactionFor(client: PgPoolClient): IngestionTransaction {
    return {
      insertObservations: async (records: FetchedPrice[]) => {
        if (records.length === 0) {
          return 0;
        }
        const params: unknown[] = [];
        const tuples = records.map((record, index) => {
          params.push(record.symbol, record.priceUsd, record.source);
          const base = index * 3;
          return `($${base + 1}, $${base + 2}, $${base + 3})`;
        });
        const result = await client.query(
          `INSERT INTO crypto_prices (symbol, price_usd, source) VALUES ${tuples.join(', ')}`,
          params,
        );
        return result.rowCount ?? records.length;
      },
      insertCheckpoint: async (checkpoint: NewCheckpoint) => {
        const result = await client.query<CheckpointRow>(
          `INSERT INTO ingestion_checkpoints (source_file, file_hash, status)
           VALUES ($1, $2, $3)
           RETURNING id, source_file, file_hash, status, created_at`,
          [checkpoint.sourceName, checkpoint.contentHash, checkpoint.status],
        );
        return toCheckpoint(result.rows[0]);
      },
    };
  }
}
