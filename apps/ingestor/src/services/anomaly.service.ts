import { Injectable } from '@nestjs/common';
import { AnomalyReport } from '../interfaces';
import { BASELINE_WINDOW, analyzeRun } from '../anomaly/anomaly-detector';
import { IngestionRepository } from '../storage/ingestion.repository';

@Injectable()
export class AnomalyService {
  constructor(private readonly repository: IngestionRepository) {}

  /**
   * Report for the most recent finished run, or null when no run has finished yet
   */
  async compareLatest(): Promise<AnomalyReport | null> {
    const latest = await this.repository.findLatestCompletedJobRun();
    if (!latest) {
      return null;
    }
    const history = await this.repository.listSuccessfulJobRuns(latest.id, BASELINE_WINDOW);
    return analyzeRun(latest, history);
  }
}
