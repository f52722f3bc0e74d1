import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { FetchAdapter } from '../interfaces';
import { CoinGeckoAdapter, CoinPaprikaAdapter, FETCH_ADAPTERS } from '../adapters';
import { SchemaValidator } from '../validation/schema-validator';
import { RunGuard } from '../concurrency/run-guard';
import { AppController } from '../controllers/app.controller';
import { IngestionController } from '../controllers/ingestion.controller';
import { QueryController } from '../controllers/query.controller';
import { IngestionService } from '../services/ingestion.service';
import { BatchIngestionService } from '../services/batch-ingestion.service';
import { CheckpointService } from '../services/checkpoint.service';
import { JobRunLedgerService } from '../services/job-run-ledger.service';
import { SchedulerService } from '../services/scheduler.service';
import { StatsService } from '../services/stats.service';
import { AnomalyService } from '../services/anomaly.service';

@Module({
  imports: [
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 3,
    }),
  ],
  controllers: [AppController, IngestionController, QueryController],
  providers: [
    SchemaValidator,
    CoinPaprikaAdapter,
    CoinGeckoAdapter,
    {
      provide: FETCH_ADAPTERS,
      useFactory: (paprika: CoinPaprikaAdapter, gecko: CoinGeckoAdapter): FetchAdapter[] => [paprika, gecko],
      inject: [CoinPaprikaAdapter, CoinGeckoAdapter],
    },
    RunGuard,
    JobRunLedgerService,
    CheckpointService,
    IngestionService,
    BatchIngestionService,
    SchedulerService,
    StatsService,
    AnomalyService,
  ],
  exports: [IngestionService, BatchIngestionService, SchedulerService],
})
export class IngestionModule {}
