import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
} from '@nestjs/common';
import { BatchIngestionResult, RunSummary } from '../interfaces';
import { describeError, isIngestionException, toHttpException } from '../exceptions';
import { BatchIngestionDto, LiveRunDto } from '../dto';
import { IngestionService } from '../services/ingestion.service';
import { BatchIngestionService } from '../services/batch-ingestion.service';

/**
 * Manual triggers. A trigger that overlaps a running job is answered with 409.
 *
 * - POST /ingest/run  - Multi-source scheduled run
 * - POST /etl/run     - Single-source live run
 * - POST /ingest-csv  - Batch file ingestion
 */
@Controller()
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(
    private readonly ingestionService: IngestionService,
    private readonly batchIngestionService: BatchIngestionService,
  ) {}

  @Post('ingest/run')
  @HttpCode(HttpStatus.OK)
  async runScheduled(): Promise<RunSummary> {
    try {
      return await this.ingestionService.runScheduled();
    } catch (error) {
      throw toHttpException(error, 'Scheduled ingestion failed');
    }
  }

  @Post('etl/run')
  @HttpCode(HttpStatus.OK)
  async runLive(@Body() body: LiveRunDto): Promise<RunSummary> {
    try {
      return await this.ingestionService.runLive(body.coinId);
    } catch (error) {
      if (isIngestionException(error) && error.kind === 'conflict') {
        throw toHttpException(error, 'Live ingestion');
      }
      this.logger.error(`Live ingestion failed: ${describeError(error)}`);
      throw new InternalServerErrorException(`Live ingestion failed: ${describeError(error)}`);
    }
  }

  @Post('ingest-csv')
  @HttpCode(HttpStatus.OK)
  async ingestCsv(@Body() body: BatchIngestionDto): Promise<BatchIngestionResult> {
    try {
      return await this.batchIngestionService.ingestFile(body.path);
    } catch (error) {
      throw toHttpException(error, 'Batch ingestion failed');
    }
  }
}
