import { Logger } from '@nestjs/common';
import {
  FetchedPrice,
  IngestionCheckpoint,
  JobRun,
  JobRunCompletion,
  JobRunStatus,
  JobRunTrigger,
  NewCheckpoint,
  PriceObservation,
} from '../interfaces';
import { IngestionRepository, IngestionTransaction, byRecency } from './ingestion.repository';

/**
 * Process-local store. Transactions stage their writes and apply them on
 * commit, so a rejected unit of work leaves nothing behind.
 */
export class InMemoryIngestionRepository extends IngestionRepository {
  private readonly logger = new Logger(InMemoryIngestionRepository.name);
  private readonly observations: PriceObservation[] = [];
  private readonly checkpoints: IngestionCheckpoint[] = [];
  private readonly jobRuns = new Map<number, JobRun>();
  private nextObservationId = 1;
  private nextCheckpointId = 1;
  private nextJobRunId = 1;

  async withTransaction<T>(work: (tx: IngestionTransaction) => Promise<T>): Promise<T> {
    const stagedObservations: FetchedPrice[] = [];
    const stagedCheckpoints: NewCheckpoint[] = [];

    const tx: IngestionTransaction = {
      insertObservations: async (records) => {
        stagedObservations.push(...records.map((record) => ({ ...record })));
        return records.length;
      },
      insertCheckpoint: async (checkpoint) => {
        const clash = [...this.checkpoints, ...stagedCheckpoints].some(
          (existing) =>
            existing.sourceName === checkpoint.sourceName &&
            existing.contentHash === checkpoint.contentHash,
        );
        if (clash) {
          throw new Error(
            `duplicate checkpoint for ${checkpoint.sourceName} (${checkpoint.contentHash})`,
          );
        }
        stagedCheckpoints.push({ ...checkpoint });
        return { id: 0, createdAt: new Date(), ...checkpoint };
      },
    };

    const result = await work(tx);

    const now = new Date();
    for (const record of stagedObservations) {
      this.observations.push({ id: this.nextObservationId++, timestamp: now, ...record });
    }
    for (const checkpoint of stagedCheckpoints) {
      this.checkpoints.push({ id: this.nextCheckpointId++, createdAt: now, ...checkpoint });
    }
    this.logger.debug(
      `Committed ${stagedObservations.length} observation(s), ${stagedCheckpoints.length} checkpoint(s)`,
    );
    return result;
  }

  async createJobRun(trigger: JobRunTrigger, runTime: Date): Promise<JobRun> {
    const run: JobRun = {
      id: this.nextJobRunId++,
      runTime,
      status: 'running',
      recordsProcessed: 0,
      durationMs: null,
      errorMessage: null,
      trigger,
    };
    this.jobRuns.set(run.id, run);
    return { ...run };
  }

  async completeJobRun(id: number, completion: JobRunCompletion): Promise<JobRun | null> {
    const run = this.jobRuns.get(id);
    if (!run || run.status !== 'running') {
      return null;
    }
    const updated: JobRun = { ...run, ...completion };
    this.jobRuns.set(id, updated);
    return { ...updated };
  }

  async findSuccessfulCheckpoint(contentHash: string): Promise<IngestionCheckpoint | null> {
    const found = this.checkpoints.find(
      (checkpoint) => checkpoint.contentHash === contentHash && checkpoint.status === 'success',
    );
    return found ? { ...found } : null;
  }

  async listObservations(offset: number, limit: number): Promise<PriceObservation[]> {
    return [...this.observations]
      .sort(byRecency<PriceObservation>((observation) => observation.timestamp))
      .slice(offset, offset + limit)
      .map((observation) => ({ ...observation }));
  }

  async countObservations(): Promise<number> {
    return this.observations.length;
  }

  async listJobRuns(limit: number): Promise<JobRun[]> {
    return this.sortedRuns()
      .slice(0, limit)
      .map((run) => ({ ...run }));
  }

  async findLatestCompletedJobRun(): Promise<JobRun | null> {
    const latest = this.sortedRuns().find((run) => run.status !== 'running');
    return latest ? { ...latest } : null;
  }

  async listSuccessfulJobRuns(excludeId: number, limit: number): Promise<JobRun[]> {
    return this.sortedRuns()
      .filter((run) => run.status === 'success' && run.id !== excludeId)
      .slice(0, limit)
      .map((run) => ({ ...run }));
  }

  async countJobRuns(statuses?: JobRunStatus[]): Promise<number> {
    if (!statuses) {
      return this.jobRuns.size;
    }
    return [...this.jobRuns.values()].filter((run) => statuses.includes(run.status)).length;
  }

  async ping(): Promise<void> {
    return;
  }

  private sortedRuns(): JobRun[] {
    return [...this.jobRuns.values()].sort(byRecency<JobRun>((run) => run.runTime));
  }
}
