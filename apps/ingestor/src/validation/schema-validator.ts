import { Injectable, Logger, Optional } from '@nestjs/common';
import { MetricsService } from '../metrics/metrics.service';

export interface SchemaValidationResult {
  ok: boolean;
  missing: Set<string>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set difference between the expected and the actual top-level keys.
 * A response that is not a JSON object is missing every expected key.
 */
export function validateSchema(raw: unknown, expectedKeys: Iterable<string>): SchemaValidationResult {
  const present = isRecord(raw) ? new Set(Object.keys(raw)) : new Set<string>();
  const missing = new Set<string>();
  for (const key of expectedKeys) {
    if (!present.has(key)) {
      missing.add(key);
    }
  }
  return { ok: missing.size === 0, missing };
}

/**
 * Reports schema drift as a warning. Never blocks extraction: if the field an
 * adapter needs is missing, extraction fails on its own afterwards.
 */
@Injectable()
export class SchemaValidator {
  private readonly logger = new Logger(SchemaValidator.name);

  constructor(@Optional() private readonly metricsService?: MetricsService) {}

  inspect(source: string, raw: unknown, expectedKeys: Iterable<string>): SchemaValidationResult {
    const result = validateSchema(raw, expectedKeys);
    if (!result.ok) {
      this.logger.warn({
        message: 'Schema drift detected',
        source,
        missing: [...result.missing].sort(),
      });
      this.metricsService?.recordSchemaDrift(source);
    }
    return result;
  }
}
