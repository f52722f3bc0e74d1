import { Controller, Get } from '@nestjs/common';
import { IngestionService } from '../services/ingestion.service';

@Controller()
export class AppController {
  constructor(private readonly ingestionService: IngestionService) {}

  @Get()
  getInfo(): { service: string; sources: string[]; docs: string[] } {
    return {
      service: 'price-ingestion-service',
      sources: this.ingestionService.getSources(),
      docs: ['/data', '/stats', '/runs', '/compare-runs', '/health', '/metrics'],
    };
  }
}
