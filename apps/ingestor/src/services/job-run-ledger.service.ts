import { Injectable, Logger, Optional } from '@nestjs/common';
import {
  CompletedJobRun,
  JobRun,
  JobRunTrigger,
  SourceOutcome,
  TerminalJobRunStatus,
} from '../interfaces';
import { LedgerStateException, PersistenceException, describeError } from '../exceptions';
import { IngestionRepository } from '../storage/ingestion.repository';
import { MetricsService } from '../metrics/metrics.service';

/**
 * An open ledger entry. Can be finalized once.
 */
export class JobRunHandle {
  private finalized = false;

  constructor(
    readonly run: JobRun,
    readonly startedAt: number,
  ) {}

  get id(): number {
    return this.run.id;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  markFinalized(): void {
    if (this.finalized) {
      throw new LedgerStateException(`Job run ${this.run.id} was already finalized`, this.run.id);
    }
    this.finalized = true;
  }
}

export interface RunFinalization {
  status: TerminalJobRunStatus;
  recordsProcessed: number;
  errorMessage?: string | null;
}

/**
 * Aggregate status of a multi-source run.
 *
 * Only a failed commit makes the run `failure`. Any failed source, including
 * all of them, makes it `partial_failure`.
 */
export function resolveScheduledStatus(
  outcomes: SourceOutcome[],
  commitFailed: boolean,
): TerminalJobRunStatus {
  if (commitFailed) {
    return 'failure';
  }
  return outcomes.some((outcome) => outcome.status === 'failed') ? 'partial_failure' : 'success';
}

/**
 * Records the lifecycle of every ingestion attempt:
 * running -> { success | partial_failure | failure | failed }
 */
@Injectable()
export class JobRunLedgerService {
  private readonly logger = new Logger(JobRunLedgerService.name);

  constructor(
    private readonly repository: IngestionRepository,
    @Optional() private readonly metricsService?: MetricsService,
  ) {}

  /**
   * Create the `running` entry. Duration is measured from here.
   */
  async open(trigger: JobRunTrigger): Promise<JobRunHandle> {
    const startedAt = Date.now();
    let run: JobRun;
    try {
      run = await this.repository.createJobRun(trigger, new Date(startedAt));
    } catch (error) {
      throw new PersistenceException(`Could not open job run: ${describeError(error)}`, error);
    }
    this.logger.log(`Job run ${run.id} (${trigger}) started`);
    return new JobRunHandle(run, startedAt);
  }

  /**
   * The single terminal write: status, record count, duration and error.
   * @throws LedgerStateException on a second finalize of the same run
   */
  async finalize(handle: JobRunHandle, outcome: RunFinalization): Promise<CompletedJobRun> {
    if (!Number.isInteger(outcome.recordsProcessed) || outcome.recordsProcessed < 0) {
      throw new RangeError(`recordsProcessed must be a non-negative integer, got ${outcome.recordsProcessed}`);
    }
    handle.markFinalized();

    const durationMs = Math.max(0, Date.now() - handle.startedAt);
    let updated: JobRun | null;
    try {
      updated = await this.repository.completeJobRun(handle.id, {
        status: outcome.status,
        recordsProcessed: outcome.recordsProcessed,
        durationMs,
        errorMessage: outcome.errorMessage ?? null,
      });
    } catch (error) {
      throw new PersistenceException(`Could not finalize job run ${handle.id}: ${describeError(error)}`, error);
    }
    if (!updated) {
      throw new LedgerStateException(`Job run ${handle.id} is no longer running`, handle.id);
    }

    const completed: CompletedJobRun = { ...updated, status: outcome.status, durationMs };
    this.metricsService?.recordRun(completed.trigger, completed.status, durationMs);
    const line = `Job run ${completed.id} (${completed.trigger}) finished: ${completed.status}, ${completed.recordsProcessed} record(s) in ${durationMs}ms`;
    if (completed.status === 'success') {
      this.logger.log(line);
    } else {
      this.logger.warn(completed.errorMessage ? `${line} - ${completed.errorMessage}` : line);
    }
    return completed;
  }
}
