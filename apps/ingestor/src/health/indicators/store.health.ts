import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { describeError } from '../../exceptions';
import { IngestionRepository } from '../../storage/ingestion.repository';

@Injectable()
export class StoreHealthIndicator extends HealthIndicator {
  constructor(private readonly repository: IngestionRepository) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      await this.repository.ping();
      return this.getStatus(key, true, { message: 'Store is reachable' });
    } catch (err) {
      throw new HealthCheckError(
        'Store check failed',
        this.getStatus(key, false, { message: describeError(err) }),
      );
    }
  }
}
