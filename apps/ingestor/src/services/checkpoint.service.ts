import { Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { CheckpointStatus, IngestionCheckpoint } from '../interfaces';
import { KeyedMutex } from '../concurrency/keyed-mutex';
import { IngestionRepository, IngestionTransaction } from '../storage/ingestion.repository';

/**
 * Content-hash checkpoints that make batch ingestion idempotent.
 *
 * The hash covers the payload bytes only, so a renamed or re-copied file
 * with identical content is recognized as already processed.
 */
@Injectable()
export class CheckpointService {
  private readonly logger = new Logger(CheckpointService.name);
  private readonly mutex = new KeyedMutex();

  constructor(private readonly repository: IngestionRepository) {}

  computeContentHash(content: Buffer | string): string {
    return createHash('sha256').update(content).digest('hex');
  }

  async checkIngested(content: Buffer | string): Promise<boolean> {
    return this.isHashIngested(this.computeContentHash(content));
  }

  async isHashIngested(contentHash: string): Promise<boolean> {
    const existing = await this.repository.findSuccessfulCheckpoint(contentHash);
    return existing !== null;
  }

  /**
   * Pass `tx` to commit the checkpoint together with the batch's observations
   */
  async recordCheckpoint(
    sourceName: string,
    contentHash: string,
    status: CheckpointStatus,
    tx?: IngestionTransaction,
  ): Promise<IngestionCheckpoint> {
    const checkpoint = { sourceName, contentHash, status };
    const saved = tx
      ? await tx.insertCheckpoint(checkpoint)
      : await this.repository.withTransaction((scoped) => scoped.insertCheckpoint(checkpoint));
    this.logger.log(`Checkpoint recorded for ${sourceName} (${contentHash.slice(0, 12)}): ${status}`);
    return saved;
  }

  /**
   * Critical section for the check-then-record sequence of one payload
   */
  runExclusive<T>(contentHash: string, work: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(contentHash, work);
  }
}
