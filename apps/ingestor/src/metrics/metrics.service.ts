import { Injectable } from '@nestjs/common';
import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';

/**
 * Service that registers and updates Prometheus metrics for the ingestion service.
 * Exposes run outcomes, run latency, fetch failures by category and schema drift.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Finalized job runs by trigger and terminal status */
  readonly runsTotal: Counter<string>;

  /** Wall-clock duration of finalized runs in seconds */
  readonly runDuration: Histogram<string>;

  /** Fetch attempts by source and outcome (success, transport, server, rate_limit, fatal) */
  readonly fetchAttempts: Counter<string>;

  readonly schemaDrift: Counter<string>;

  /** Triggers dropped because another run held the guard */
  readonly skippedTriggers: Counter<string>;

  readonly batchResults: Counter<string>;

  constructor() {
    this.register = new Registry();
    this.runsTotal = new Counter({
      name: 'ingestion_runs_total',
      help: 'Total number of finalized ingestion runs',
      labelNames: ['trigger', 'status'],
      registers: [this.register],
    });
    this.runDuration = new Histogram({
      name: 'ingestion_run_duration_seconds',
      help: 'Ingestion run duration in seconds',
      labelNames: ['trigger'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers: [this.register],
    });
    this.fetchAttempts = new Counter({
      name: 'ingestion_fetch_attempts_total',
      help: 'Upstream fetch attempts by source and outcome',
      labelNames: ['source', 'outcome'],
      registers: [this.register],
    });
    this.schemaDrift = new Counter({
      name: 'ingestion_schema_drift_total',
      help: 'Responses missing expected top-level keys',
      labelNames: ['source'],
      registers: [this.register],
    });
    this.skippedTriggers = new Counter({
      name: 'ingestion_skipped_triggers_total',
      help: 'Triggers skipped because a run was already active',
      labelNames: ['trigger'],
      registers: [this.register],
    });
    this.batchResults = new Counter({
      name: 'ingestion_batch_results_total',
      help: 'Batch ingestion results by status',
      labelNames: ['status'],
      registers: [this.register],
    });
    collectDefaultMetrics({ register: this.register, prefix: 'ingestion_' });
  }

  recordRun(trigger: string, status: string, durationMs: number): void {
    this.runsTotal.inc({ trigger, status }, 1);
    this.runDuration.observe({ trigger }, durationMs / 1000);
  }

  recordFetchAttempt(source: string, outcome: string): void {
    this.fetchAttempts.inc({ source, outcome }, 1);
  }

  recordSchemaDrift(source: string): void {
    this.schemaDrift.inc({ source }, 1);
  }

  recordSkippedTrigger(trigger: string): void {
    this.skippedTriggers.inc({ trigger }, 1);
  }

  recordBatchResult(status: string): void {
    this.batchResults.inc({ status }, 1);
  }

  getRegister(): Registry {
    return this.register;
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  getContentType(): string {
    return this.register.contentType;
  }
}
