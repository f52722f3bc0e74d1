import { Controller, Get, HttpCode, HttpStatus, NotFoundException, Query } from '@nestjs/common';
import {
  AnomalyReport,
  IngestionStats,
  JobRun,
  PaginatedObservations,
} from '../interfaces';
import { PaginationQueryDto, RunHistoryQueryDto } from '../dto';
import { StatsService } from '../services/stats.service';
import { AnomalyService } from '../services/anomaly.service';

@Controller()
export class QueryController {
  constructor(
    private readonly statsService: StatsService,
    private readonly anomalyService: AnomalyService,
  ) {}

  /** Stored observations, newest first */
  @Get('data')
  @HttpCode(HttpStatus.OK)
  async getData(@Query() query: PaginationQueryDto): Promise<PaginatedObservations> {
    return this.statsService.getObservations(query.page, query.limit);
  }

  @Get('stats')
  @HttpCode(HttpStatus.OK)
  async getStats(): Promise<IngestionStats> {
    return this.statsService.getStats();
  }

  @Get('runs')
  @HttpCode(HttpStatus.OK)
  async getRuns(@Query() query: RunHistoryQueryDto): Promise<JobRun[]> {
    return this.statsService.getRunHistory(query.limit);
  }

  @Get('compare-runs')
  @HttpCode(HttpStatus.OK)
  async compareRuns(): Promise<AnomalyReport> {
    const report = await this.anomalyService.compareLatest();
    if (!report) {
      throw new NotFoundException('No run history');
    }
    return report;
  }
}
