import { Controller, Get, Header, HttpCode, HttpStatus } from '@nestjs/common';
import { MetricsService } from './metrics.service';

/**
 * Scrape target for the ingestion counters: run outcomes and durations,
 * fetch attempts per source, schema drift, batch results and skipped triggers.
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  scrape(): Promise<string> {
    return this.metricsService.getMetrics();
  }
}
