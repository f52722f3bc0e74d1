import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { RunSummary } from '../interfaces';
import { RunGuard } from '../concurrency/run-guard';
import { MetricsService } from '../metrics/metrics.service';
import { IngestionService } from './ingestion.service';
import { SCHEDULER_INTERVAL_NAME, SchedulerService } from './scheduler.service';

describe('SchedulerService', () => {
  let service: SchedulerService;
  let schedulerRegistry: SchedulerRegistry;
  let configService: { get: jest.Mock };
  let ingestionService: { runScheduled: jest.Mock<Promise<RunSummary>, []> };
  let runGuard: { activeRun: jest.Mock; whenIdle: jest.Mock };
  let metricsService: { recordSkippedTrigger: jest.Mock };
  let config: Record<string, unknown>;

  const summary: RunSummary = {
    runId: 1,
    trigger: 'scheduled',
    status: 'success',
    recordsProcessed: 2,
    durationMs: 15,
    errorMessage: null,
    sources: [],
  };

  const createService = async (): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SchedulerService,
        SchedulerRegistry,
        { provide: ConfigService, useValue: configService },
        { provide: IngestionService, useValue: ingestionService },
        { provide: RunGuard, useValue: runGuard },
        { provide: MetricsService, useValue: metricsService },
      ],
    }).compile();

    service = module.get<SchedulerService>(SchedulerService);
    schedulerRegistry = module.get<SchedulerRegistry>(SchedulerRegistry);
  };

  beforeEach(async () => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();

    config = { FETCH_INTERVAL_MS: '1000' };
    configService = { get: jest.fn((key: string) => config[key]) };
    ingestionService = { runScheduled: jest.fn<Promise<RunSummary>, []>().mockResolvedValue(summary) };
    runGuard = { activeRun: jest.fn().mockReturnValue(null), whenIdle: jest.fn().mockResolvedValue(undefined) };
    metricsService = { recordSkippedTrigger: jest.fn() };

    await createService();
  });

  afterEach(() => {
    service.stopScheduler();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should read fetch interval from config', () => {
      expect(configService.get).toHaveBeenCalledWith('FETCH_INTERVAL_MS');
      expect(service.getIntervalMs()).toBe(1000);
    });

    it('should default to one minute', async () => {
      config = {};
      await createService();

      expect(service.getIntervalMs()).toBe(60000);
    });
  });

  describe('startScheduler', () => {
    it('should run immediately and register the interval', () => {
      service.startScheduler();

      expect(ingestionService.runScheduled).toHaveBeenCalledTimes(1);
      expect(service.isSchedulerRunning()).toBe(true);
      expect(schedulerRegistry.getIntervals()).toEqual([SCHEDULER_INTERVAL_NAME]);
    });

    it('should run again on every interval', () => {
      service.startScheduler();

      jest.advanceTimersByTime(3000);

      expect(ingestionService.runScheduled).toHaveBeenCalledTimes(4);
    });

    it('should not start twice', () => {
      service.startScheduler();
      service.startScheduler();

      expect(ingestionService.runScheduled).toHaveBeenCalledTimes(1);
      expect(Logger.prototype.warn).toHaveBeenCalledWith('Scheduler is already running');
    });
  });

  describe('stopScheduler', () => {
    it('should stop future ticks', () => {
      service.startScheduler();
      service.stopScheduler();

      jest.advanceTimersByTime(5000);

      expect(service.isSchedulerRunning()).toBe(false);
      expect(ingestionService.runScheduled).toHaveBeenCalledTimes(1);
    });

    it('should be a no-op when not running', () => {
      expect(() => service.stopScheduler()).not.toThrow();
    });
  });

  describe('triggerNow', () => {
    it('should skip the tick while another run holds the guard', async () => {
      runGuard.activeRun.mockReturnValue({ label: 'live', startedAt: 0 });

      await service.triggerNow();

      expect(ingestionService.runScheduled).not.toHaveBeenCalled();
      expect(metricsService.recordSkippedTrigger).toHaveBeenCalledWith('scheduled');
      expect(Logger.prototype.warn).toHaveBeenCalledWith('Skipping scheduled tick: live run still in progress');
    });

    it('should log run failures instead of throwing', async () => {
      ingestionService.runScheduled.mockRejectedValue(new Error('Failed to commit observations: disk full'));

      await expect(service.triggerNow()).resolves.toBeUndefined();

      expect(Logger.prototype.error).toHaveBeenCalledWith(
        'Scheduled run failed: Failed to commit observations: disk full',
      );
    });
  });

  describe('lifecycle', () => {
    it('should start on module init', () => {
      service.onModuleInit();

      expect(service.isSchedulerRunning()).toBe(true);
    });

    it('should stay idle when SCHEDULER_ENABLED is false', async () => {
      config = { FETCH_INTERVAL_MS: '1000', SCHEDULER_ENABLED: 'false' };
      await createService();

      service.onModuleInit();

      expect(service.isSchedulerRunning()).toBe(false);
      expect(ingestionService.runScheduled).not.toHaveBeenCalled();
    });

    it('should stop and wait for the in-flight run on destroy', async () => {
      service.startScheduler();

      await service.onModuleDestroy();

      expect(service.isSchedulerRunning()).toBe(false);
      expect(runGuard.whenIdle).toHaveBeenCalledTimes(1);
    });
  });
});
