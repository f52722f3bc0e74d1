import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
} from '@nestjs/terminus';
import { StoreHealthIndicator } from './indicators/store.health';

/**
 * - GET /health - Store connectivity. 200 if OK, 503 otherwise.
 * - GET /live   - Liveness probe, no dependency checks.
 */
@Controller()
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly store: StoreHealthIndicator,
  ) {}

  @Get('health')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async check(): Promise<HealthCheckResult> {
    const result = await this.health.check([() => this.store.isHealthy('store')]);
    if (result.status === 'ok') {
      return result;
    }
    throw new ServiceUnavailableException(result);
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  live(): { status: string } {
    return { status: 'ok' };
  }
}
