import { PriceSource } from './price-observation.interface';
import { IngestionErrorKind } from '../exceptions';

export type JobRunStatus =
  | 'running'
  | 'success'
  | 'partial_failure'
  | 'failure'
  | 'failed';

export type TerminalJobRunStatus = Exclude<JobRunStatus, 'running'>;

/** Which path started the run */
export type JobRunTrigger = 'scheduled' | 'live' | 'batch';

/**
 * Audit record of one ingestion attempt.
 * Created as `running`, finalized exactly once, never touched again.
 */
export interface JobRun {
  id: number;
  runTime: Date;
  status: JobRunStatus;
  recordsProcessed: number;
  /** Null while the run is still in flight */
  durationMs: number | null;
  errorMessage: string | null;
  trigger: JobRunTrigger;
}

export interface CompletedJobRun extends JobRun {
  status: TerminalJobRunStatus;
  durationMs: number;
}

/**
 * Fields written by the single terminal update of a run
 */
export interface JobRunCompletion {
  status: TerminalJobRunStatus;
  recordsProcessed: number;
  durationMs: number;
  errorMessage: string | null;
}

/**
 * What happened to one upstream source inside a run
 */
export interface SourceOutcome {
  source: PriceSource;
  status: 'success' | 'failed';
  attempts: number;
  symbol?: string;
  priceUsd?: number;
  error?: string;
  errorKind?: IngestionErrorKind;
}

export interface RunSummary {
  runId: number;
  trigger: JobRunTrigger;
  status: TerminalJobRunStatus;
  recordsProcessed: number;
  durationMs: number;
  errorMessage: string | null;
  sources: SourceOutcome[];
}

export interface LastRunSummary {
  time: Date;
  status: JobRunStatus;
  records: number;
  durationMs: number | null;
}

export interface IngestionStats {
  systemStatus: 'healthy' | 'degraded';
  totalJobsRun: number;
  failedJobs: number;
  lastRun: LastRunSummary | null;
}
