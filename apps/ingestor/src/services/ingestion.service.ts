import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  FetchAdapter,
  FetchedPrice,
  CompletedJobRun,
  RunSummary,
  SourceOutcome,
} from '../interfaces';
import {
  FatalFetchException,
  PersistenceException,
  RunInProgressException,
  describeError,
} from '../exceptions';
import { RetryOutcome, executeWithRetry } from '../retry';
import { FETCH_ADAPTERS } from '../adapters';
import { CoinGeckoAdapter } from '../adapters/coingecko.adapter';
import { RunGuard } from '../concurrency/run-guard';
import { IngestionRepository } from '../storage/ingestion.repository';
import { MetricsService } from '../metrics/metrics.service';
import { JobRunHandle, JobRunLedgerService, resolveScheduledStatus } from './job-run-ledger.service';

type SourceResult =
  | { outcome: SourceOutcome; record: FetchedPrice; error?: undefined }
  | { outcome: SourceOutcome; record?: undefined; error: FatalFetchException };

/**
 * Runs the live ingestion paths:
 * - scheduled: every configured source, fetched independently and concurrently
 * - live: one CoinGecko pull, triggered on demand
 *
 * Both hold the run guard for their whole duration and leave exactly one ledger entry.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    @Inject(FETCH_ADAPTERS) private readonly adapters: FetchAdapter[],
    private readonly liveAdapter: CoinGeckoAdapter,
    private readonly repository: IngestionRepository,
    private readonly ledger: JobRunLedgerService,
    private readonly runGuard: RunGuard,
    @Optional() private readonly metricsService?: MetricsService,
  ) {
    this.logger.log(`Configured sources: ${this.adapters.map((adapter) => adapter.name).join(', ')}`);
  }

  getSources(): string[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  /**
   * Multi-source run. A failing source never aborts the others; a failed
   * commit marks the run `failure` and is re-raised.
   * @throws RunInProgressException if another run is active
   * @throws PersistenceException if the observations could not be committed
   */
  async runScheduled(): Promise<RunSummary> {
    const attempt = this.runGuard.tryRun('scheduled', () => this.executeScheduledRun());
    if (!attempt.started) {
      this.metricsService?.recordSkippedTrigger('scheduled');
      throw new RunInProgressException(attempt.activeRun);
    }
    return attempt.result;
  }

  /**
   * Single-source run: success or `failed` with the triggering error.
   * @throws RunInProgressException if another run is active
   */
  async runLive(coinId?: string): Promise<RunSummary> {
    const attempt = this.runGuard.tryRun('live', () => this.executeLiveRun(coinId ?? this.liveAdapter.defaultCoinId));
    if (!attempt.started) {
      this.metricsService?.recordSkippedTrigger('live');
      throw new RunInProgressException(attempt.activeRun);
    }
    return attempt.result;
  }

  private async executeScheduledRun(): Promise<RunSummary> {
    const handle = await this.ledger.open('scheduled');
    try {
      return await this.completeScheduledRun(handle);
    } catch (error) {
      if (!handle.isFinalized) {
        const message = describeError(error);
        this.logger.error(`Job run ${handle.id}: scheduled ingestion aborted: ${message}`);
        await this.ledger.finalize(handle, { status: 'failure', recordsProcessed: 0, errorMessage: message });
      }
      throw error;
    }
  }

  private async completeScheduledRun(handle: JobRunHandle): Promise<RunSummary> {
    // Funnel every source through one aggregation point before the terminal write
    const results = await Promise.all(this.adapters.map((adapter) => this.fetchSource(adapter, adapter.defaultCoinId)));
    const outcomes = results.map((result) => result.outcome);
    const records = results.flatMap((result) => (result.record ? [result.record] : []));

    let written = 0;
    let commitError: PersistenceException | null = null;
    if (records.length > 0) {
      try {
        written = await this.persist(records);
      } catch (error) {
        commitError = error instanceof PersistenceException
          ? error
          : new PersistenceException(`Failed to commit observations: ${describeError(error)}`, error);
        this.logger.error(`Job run ${handle.id}: ${commitError.message}`);
      }
    }

    const status = resolveScheduledStatus(outcomes, commitError !== null);
    const sourceErrors = outcomes
      .filter((outcome) => outcome.status === 'failed')
      .map((outcome) => `${outcome.source}: ${outcome.error}`)
      .join('; ');

    const run = await this.ledger.finalize(handle, {
      status,
      recordsProcessed: commitError ? 0 : written,
      errorMessage: commitError?.message ?? (sourceErrors || null),
    });

    if (commitError) {
      throw commitError;
    }
    return this.summarize(run, outcomes);
  }

  private async executeLiveRun(coinId: string): Promise<RunSummary> {
    const handle = await this.ledger.open('live');

    let outcome: SourceOutcome;
    let written: number;
    try {
      const result = await this.fetchSource(this.liveAdapter, coinId);
      outcome = result.outcome;
      if (result.record === undefined) {
        throw result.error;
      }
      written = await this.persist([result.record]);
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Job run ${handle.id}: live ingestion failed: ${message}`);
      await this.ledger.finalize(handle, { status: 'failed', recordsProcessed: 0, errorMessage: message });
      throw error;
    }

    const run = await this.ledger.finalize(handle, { status: 'success', recordsProcessed: written });
    return this.summarize(run, [outcome]);
  }

  /**
   * One source, wrapped in its retry policy. Never rejects.
   */
  private async fetchSource(adapter: FetchAdapter, coinId: string): Promise<SourceResult> {
    let result: RetryOutcome<FetchedPrice>;
    try {
      result = await executeWithRetry(() => adapter.fetch(coinId), adapter.retryPolicy, {
        label: adapter.name,
        logger: this.logger,
        onAttemptFailed: (error) => {
          const outcome = error.kind === 'retryable' ? error.category : 'fatal';
          this.metricsService?.recordFetchAttempt(adapter.source, outcome);
        },
      });
    } catch (error) {
      // Anything thrown outside the retried call, e.g. an unusable policy
      result = {
        ok: false,
        attempts: 0,
        error: new FatalFetchException(`${adapter.name}: ${describeError(error)}`, adapter.name, undefined, error),
      };
    }

    if (result.ok) {
      this.metricsService?.recordFetchAttempt(adapter.source, 'success');
      this.logger.log(`Price fetched from ${adapter.name}: ${result.value.symbol} $${result.value.priceUsd}`);
      return {
        record: result.value,
        outcome: {
          source: adapter.source,
          status: 'success',
          attempts: result.attempts,
          symbol: result.value.symbol,
          priceUsd: result.value.priceUsd,
        },
      };
    }

    this.logger.error(`Source failed: ${adapter.name} after ${result.attempts} attempt(s): ${result.error.message}`);
    return {
      error: result.error,
      outcome: {
        source: adapter.source,
        status: 'failed',
        attempts: result.attempts,
        error: result.error.message,
        errorKind: result.error.kind,
      },
    };
  }

  private async persist(records: FetchedPrice[]): Promise<number> {
    try {
      return await this.repository.withTransaction((tx) => tx.insertObservations(records));
    } catch (error) {
      throw new PersistenceException(`Failed to commit observations: ${describeError(error)}`, error);
    }
  }

  private summarize(run: CompletedJobRun, sources: SourceOutcome[]): RunSummary {
    return {
      runId: run.id,
      trigger: run.trigger,
      status: run.status,
      recordsProcessed: run.recordsProcessed,
      durationMs: run.durationMs,
      errorMessage: run.errorMessage,
      sources,
    };
  }
}
