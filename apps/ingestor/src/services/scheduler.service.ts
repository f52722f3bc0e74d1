import { Injectable, Logger, OnModuleDestroy, OnModuleInit, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { readBoolean, readNumber } from '../config/config.helpers';
import { RunGuard } from '../concurrency/run-guard';
import { MetricsService } from '../metrics/metrics.service';
import { describeError } from '../exceptions';
import { IngestionService } from './ingestion.service';

export const SCHEDULER_INTERVAL_NAME = 'price-ingestion';

@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly fetchIntervalMs: number;
  private readonly enabled: boolean;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly ingestionService: IngestionService,
    private readonly runGuard: RunGuard,
    @Optional() private readonly metricsService?: MetricsService,
  ) {
    this.fetchIntervalMs = readNumber(this.configService, 'FETCH_INTERVAL_MS', 60000);
    this.enabled = readBoolean(this.configService, 'SCHEDULER_ENABLED', true);
    if (this.fetchIntervalMs <= 0) {
      throw new RangeError(`FETCH_INTERVAL_MS must be positive, got ${this.fetchIntervalMs}`);
    }
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logger.log('Scheduler disabled by SCHEDULER_ENABLED');
      return;
    }
    this.startScheduler();
  }

  /** Stops new ticks, then waits for an in-flight run to close its ledger entry */
  async onModuleDestroy(): Promise<void> {
    this.stopScheduler();
    await this.runGuard.whenIdle();
  }

  startScheduler(): void {
    if (this.isSchedulerRunning()) {
      this.logger.warn('Scheduler is already running');
      return;
    }

    this.logger.log(`Starting ingestion scheduler with interval: ${this.fetchIntervalMs}ms`);

    // First tick runs immediately
    void this.executeTick();

    const interval = setInterval(() => {
      void this.executeTick();
    }, this.fetchIntervalMs);
    this.schedulerRegistry.addInterval(SCHEDULER_INTERVAL_NAME, interval);
  }

  stopScheduler(): void {
    if (!this.isSchedulerRunning()) {
      return;
    }
    // deleteInterval also clears the timer
    this.schedulerRegistry.deleteInterval(SCHEDULER_INTERVAL_NAME);
    this.logger.log('Ingestion scheduler stopped');
  }

  isSchedulerRunning(): boolean {
    return this.schedulerRegistry.doesExist('interval', SCHEDULER_INTERVAL_NAME);
  }

  getIntervalMs(): number {
    return this.fetchIntervalMs;
  }

  /** Runs one tick out of band; resolves when it has finished or been skipped */
  triggerNow(): Promise<void> {
    return this.executeTick();
  }

  private async executeTick(): Promise<void> {
    const active = this.runGuard.activeRun();
    if (active) {
      this.metricsService?.recordSkippedTrigger('scheduled');
      this.logger.warn(`Skipping scheduled tick: ${active.label} run still in progress`);
      return;
    }

    try {
      const summary = await this.ingestionService.runScheduled();
      this.logger.log(
        `Scheduled run #${summary.runId} finished: ${summary.status}, ${summary.recordsProcessed} record(s) in ${summary.durationMs}ms`,
      );
    } catch (error) {
      this.logger.error(`Scheduled run failed: ${describeError(error)}`);
    }
  }
}
