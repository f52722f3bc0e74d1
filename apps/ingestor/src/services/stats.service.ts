import { Injectable } from '@nestjs/common';
import { IngestionStats, JobRun, PaginatedObservations } from '../interfaces';
import { IngestionRepository } from '../storage/ingestion.repository';

/**
 * Read side of the service: observations, run history and health summary
 */
@Injectable()
export class StatsService {
  constructor(private readonly repository: IngestionRepository) {}

  async getObservations(page: number, limit: number): Promise<PaginatedObservations> {
    if (!Number.isInteger(page) || page < 1 || !Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`page must be >= 1 and limit > 0 (got page=${page}, limit=${limit})`);
    }
    const data = await this.repository.listObservations((page - 1) * limit, limit);
    return { page, limit, count: data.length, data };
  }

  async getStats(): Promise<IngestionStats> {
    const [totalJobsRun, failedJobs, lastRun] = await Promise.all([
      this.repository.countJobRuns(),
      this.repository.countJobRuns(['failure', 'failed']),
      this.repository.findLatestCompletedJobRun(),
    ]);

    return {
      systemStatus: lastRun?.status === 'success' ? 'healthy' : 'degraded',
      totalJobsRun,
      failedJobs,
      lastRun: lastRun
        ? {
            time: lastRun.runTime,
            status: lastRun.status,
            records: lastRun.recordsProcessed,
            durationMs: lastRun.durationMs,
          }
        : null,
    };
  }

  async getRunHistory(limit: number): Promise<JobRun[]> {
    return this.repository.listJobRuns(limit);
  }
}
