import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { BatchIngestionResult, FetchedPrice } from '../interfaces';
import {
  BatchSourceNotFoundException,
  BatchSourceRejectedException,
  PersistenceException,
  RunInProgressException,
  describeError,
} from '../exceptions';
import { readString } from '../config/config.helpers';
import { RunGuard } from '../concurrency/run-guard';
import { parseCsvPrices } from '../parsers/csv-price.parser';
import { IngestionRepository } from '../storage/ingestion.repository';
import { MetricsService } from '../metrics/metrics.service';
import { CheckpointService } from './checkpoint.service';
import { JobRunHandle, JobRunLedgerService } from './job-run-ledger.service';

export const DEFAULT_BATCH_FILE_PATH = 'data/market_data.csv';

/**
 * File-based ingestion gated by content-hash checkpoints.
 * Observations and the checkpoint commit in one transaction.
 */
@Injectable()
export class BatchIngestionService {
  private readonly logger = new Logger(BatchIngestionService.name);
  private readonly defaultPath: string;
  private readonly batchRoot: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly repository: IngestionRepository,
    private readonly checkpoints: CheckpointService,
    private readonly ledger: JobRunLedgerService,
    private readonly runGuard: RunGuard,
    @Optional() private readonly metricsService?: MetricsService,
  ) {
    this.defaultPath = path.resolve(readString(configService, 'BATCH_FILE_PATH', DEFAULT_BATCH_FILE_PATH));
    this.batchRoot = path.dirname(this.defaultPath);
  }

  /**
   * A caller-supplied path is resolved against the directory of BATCH_FILE_PATH
   * and must stay inside it.
   * @throws BatchSourceRejectedException if the path leaves the batch directory
   * @throws BatchSourceNotFoundException before any run is attempted
   * @throws RunInProgressException if another run is active
   * @throws PersistenceException if the batch could not be committed
   */
  async ingestFile(filePath?: string): Promise<BatchIngestionResult> {
    const resolved = filePath === undefined ? this.defaultPath : this.confine(filePath);
    const content = await this.readSource(resolved);
    return this.ingestContent(path.basename(resolved), content);
  }

  /**
   * Ingest an in-memory payload under the run guard.
   * @throws RunInProgressException if another run is active
   */
  async ingestContent(sourceName: string, content: Buffer | string): Promise<BatchIngestionResult> {
    const attempt = this.runGuard.tryRun('batch', () => this.processContent(sourceName, content));
    if (!attempt.started) {
      this.metricsService?.recordSkippedTrigger('batch');
      throw new RunInProgressException(attempt.activeRun);
    }
    const result = await attempt.result;
    this.metricsService?.recordBatchResult(result.status);
    return result;
  }

  /**
   * The idempotence check runs before anything is written
   */
  private async processContent(sourceName: string, content: Buffer | string): Promise<BatchIngestionResult> {
    const contentHash = this.checkpoints.computeContentHash(content);

    return this.checkpoints.runExclusive<BatchIngestionResult>(contentHash, async () => {
      if (await this.checkpoints.isHashIngested(contentHash)) {
        this.logger.log(`Skipping ${sourceName}: content ${contentHash.slice(0, 12)} already processed`);
        return {
          status: 'idempotent_skip',
          message: 'Skipped: file already processed.',
          contentHash,
        };
      }

      const handle = await this.ledger.open('batch');
      try {
        return await this.writeBatch(handle, sourceName, content, contentHash);
      } catch (error) {
        if (!handle.isFinalized) {
          const message = describeError(error);
          this.logger.error(`Batch ${sourceName} aborted: ${message}`);
          await this.ledger.finalize(handle, { status: 'failed', recordsProcessed: 0, errorMessage: message });
        }
        throw error;
      }
    });
  }

  private async writeBatch(
    handle: JobRunHandle,
    sourceName: string,
    content: Buffer | string,
    contentHash: string,
  ): Promise<BatchIngestionResult> {
    let rows: FetchedPrice[];
    try {
      rows = parseCsvPrices(content);
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Batch ${sourceName} rejected: ${message}`);
      await this.ledger.finalize(handle, { status: 'failed', recordsProcessed: 0, errorMessage: message });
      return { status: 'error', message, contentHash, runId: handle.id };
    }

    let written: number;
    try {
      written = await this.repository.withTransaction(async (tx) => {
        const count = await tx.insertObservations(rows);
        await this.checkpoints.recordCheckpoint(sourceName, contentHash, 'success', tx);
        return count;
      });
    } catch (error) {
      throw new PersistenceException(`Failed to commit batch ${sourceName}: ${describeError(error)}`, error);
    }

    await this.ledger.finalize(handle, { status: 'success', recordsProcessed: written });
    return {
      status: 'processed',
      message: `Successfully ingested ${written} new records.`,
      recordsWritten: written,
      contentHash,
      runId: handle.id,
    };
  }

  private confine(filePath: string): string {
    const resolved = path.resolve(this.batchRoot, filePath);
    const relative = path.relative(this.batchRoot, resolved);
    if (relative === '' || relative.split(path.sep)[0] === '..' || path.isAbsolute(relative)) {
      throw new BatchSourceRejectedException(filePath, this.batchRoot);
    }
    return resolved;
  }

  private async readSource(location: string): Promise<Buffer> {
    try {
      return await fs.readFile(location);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new BatchSourceNotFoundException(location);
      }
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR')
  );
}
