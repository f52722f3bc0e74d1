import { ConfigService } from '@nestjs/config';
import { readBoolean, readNumber, readOptionalString, readString } from './config.helpers';
import { DEFAULT_RETRY_POLICIES, resolveRetryPolicy } from './retry-policies.config';
import { PriceSource } from '../interfaces';

describe('config helpers', () => {
  const config = new ConfigService({
    TEST_NUMBER: '2500',
    TEST_NUMERIC: 42,
    TEST_EMPTY: '',
    TEST_BAD_NUMBER: 'soon',
    TEST_FLAG_OFF: 'off',
    TEST_FLAG_ON: 'yes',
    TEST_STRING: '  padded  ',
    TEST_BLANK: '   ',
  });

  describe('readNumber', () => {
    it('should parse numeric strings and pass numbers through', () => {
      expect(readNumber(config, 'TEST_NUMBER', 1)).toBe(2500);
      expect(readNumber(config, 'TEST_NUMERIC', 1)).toBe(42);
    });

    it('should fall back when the key is missing or empty', () => {
      expect(readNumber(config, 'TEST_MISSING', 7)).toBe(7);
      expect(readNumber(config, 'TEST_EMPTY', 7)).toBe(7);
    });

    it('should reject values that are not numbers', () => {
      expect(() => readNumber(config, 'TEST_BAD_NUMBER', 1)).toThrow(
        'Configuration TEST_BAD_NUMBER must be a number, got "soon"',
      );
    });
  });

  describe('readBoolean', () => {
    it('should read false-like strings as false', () => {
      expect(readBoolean(config, 'TEST_FLAG_OFF', true)).toBe(false);
      expect(readBoolean(config, 'TEST_FLAG_ON', false)).toBe(true);
      expect(readBoolean(config, 'TEST_MISSING', true)).toBe(true);
    });
  });

  describe('readString', () => {
    it('should trim values and fall back on blanks', () => {
      expect(readString(config, 'TEST_STRING', 'x')).toBe('padded');
      expect(readString(config, 'TEST_BLANK', 'x')).toBe('x');
      expect(readOptionalString(config, 'TEST_BLANK')).toBeUndefined();
      expect(readOptionalString(config, 'TEST_STRING')).toBe('padded');
    });
  });
});

describe('resolveRetryPolicy', () => {
  it('should return the per-source defaults when nothing is overridden', () => {
    const config = new ConfigService({});

    expect(resolveRetryPolicy(config, PriceSource.COINPAPRIKA)).toEqual(DEFAULT_RETRY_POLICIES[PriceSource.COINPAPRIKA]);
    expect(resolveRetryPolicy(config, PriceSource.COINGECKO)).toEqual({
      maxAttempts: 3,
      baseDelayMs: 4000,
      growthFactor: 2,
      maxDelayMs: 20000,
      jitter: false,
    });
  });

  it('should apply RETRY_<SOURCE>_* overrides field by field', () => {
    const config = new ConfigService({
      RETRY_COINGECKO_MAX_ATTEMPTS: '5',
      RETRY_COINGECKO_JITTER: 'true',
    });

    expect(resolveRetryPolicy(config, PriceSource.COINGECKO)).toEqual({
      maxAttempts: 5,
      baseDelayMs: 4000,
      growthFactor: 2,
      maxDelayMs: 20000,
      jitter: true,
    });
  });

  it('should reject a non-positive attempt count', () => {
    const config = new ConfigService({ RETRY_COINPAPRIKA_MAX_ATTEMPTS: '0' });

    expect(() => resolveRetryPolicy(config, PriceSource.COINPAPRIKA)).toThrow(
      'RETRY_COINPAPRIKA_MAX_ATTEMPTS must be a positive integer',
    );
  });
});
