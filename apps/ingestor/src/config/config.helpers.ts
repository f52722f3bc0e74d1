import { ConfigService } from '@nestjs/config';

/**
 * Environment values arrive as strings; tests and defaults may hand over numbers.
 */
export function readNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Configuration ${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function readBoolean(config: ConfigService, key: string, fallback: boolean): boolean {
  const raw = config.get<string | boolean>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function readString(config: ConfigService, key: string, fallback: string): string {
  const raw = config.get<string>(key);
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

export function readOptionalString(config: ConfigService, key: string): string | undefined {
  const raw = config.get<string>(key);
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}
