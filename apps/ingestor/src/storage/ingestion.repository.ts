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

/**
 * Writes that must commit or roll back together
 */
export interface IngestionTransaction {
  /** @returns number of observations written */
  insertObservations(records: FetchedPrice[]): Promise<number>;

  /** Fails if a checkpoint for the same (sourceName, contentHash) exists */
  insertCheckpoint(checkpoint: NewCheckpoint): Promise<IngestionCheckpoint>;
}

/**
 * Persistence port for the three durable collections: observations,
 * checkpoints and job runs. Used as the injection token as well.
 */
export abstract class IngestionRepository {
  /**
   * Scoped unit of work. Commits when `work` resolves, rolls back when it
   * rejects, and releases the underlying handle on every path.
   */
  abstract withTransaction<T>(work: (tx: IngestionTransaction) => Promise<T>): Promise<T>;

  abstract createJobRun(trigger: JobRunTrigger, runTime: Date): Promise<JobRun>;

  /**
   * Terminal update. Applies only while the row is still `running`.
   * @returns the updated run, or null if it was not running
   */
  abstract completeJobRun(id: number, completion: JobRunCompletion): Promise<JobRun | null>;

  abstract findSuccessfulCheckpoint(contentHash: string): Promise<IngestionCheckpoint | null>;

  /** Newest first */
  abstract listObservations(offset: number, limit: number): Promise<PriceObservation[]>;

  abstract countObservations(): Promise<number>;

  /** Newest first */
  abstract listJobRuns(limit: number): Promise<JobRun[]>;

  /** Most recent run that is no longer `running` */
  abstract findLatestCompletedJobRun(): Promise<JobRun | null>;

  /** Most recent `success` runs, newest first, excluding `excludeId` */
  abstract listSuccessfulJobRuns(excludeId: number, limit: number): Promise<JobRun[]>;

  /** Count all runs, or only those in the given statuses */
  abstract countJobRuns(statuses?: JobRunStatus[]): Promise<number>;

  abstract ping(): Promise<void>;
}

/** Newest first, with id breaking ties between equal timestamps */
export function byRecency<T extends { id: number }>(timeOf: (item: T) => Date) {
  return (a: T, b: T): number => {
    const diff = timeOf(b).getTime() - timeOf(a).getTime();
    return diff !== 0 ? diff : b.id - a.id;
  };
}
