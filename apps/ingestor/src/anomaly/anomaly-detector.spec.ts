import { JobRun } from '../interfaces';
import { analyzeRun } from './anomaly-detector';

function run(overrides: Partial<JobRun> = {}): JobRun {
  return {
    id: 1,
    runTime: new Date('2026-01-01T00:00:00Z'),
    status: 'success',
    recordsProcessed: 2,
    durationMs: 300,
    errorMessage: null,
    trigger: 'scheduled',
    ...overrides,
  };
}

describe('analyzeRun', () => {
  const baseline = [run({ id: 1, durationMs: 250 }), run({ id: 2, durationMs: 300 }), run({ id: 3, durationMs: 350 })];

  it('should report baseline_building without history', () => {
    expect(analyzeRun(run({ id: 9 }), [])).toEqual({
      latestRunId: 9,
      status: 'baseline_building',
      anomalies: [],
      metrics: {},
    });
  });

  it('should report normal for a run in line with the baseline', () => {
    expect(analyzeRun(run({ id: 4, durationMs: 300 }), baseline)).toEqual({
      latestRunId: 4,
      status: 'normal',
      anomalies: [],
      metrics: {
        latestDurationMs: 300,
        avgDurationMs: 300,
        avgRecordsProcessed: 2,
        baselineSize: 3,
      },
    });
  });

  it('should flag a duration spike above twice the average', () => {
    const report = analyzeRun(run({ id: 4, durationMs: 1200 }), baseline);

    expect(report.status).toBe('anomaly_detected');
    expect(report.anomalies).toEqual(['duration spike']);
  });

  it('should ignore spikes under the absolute floor', () => {
    const fast = [run({ id: 1, durationMs: 100 }), run({ id: 2, durationMs: 100 })];

    const report = analyzeRun(run({ id: 3, durationMs: 400 }), fast);

    expect(report.status).toBe('normal');
    expect(report.anomalies).toEqual([]);
  });

  it('should flag a failed run together with the resulting data gap', () => {
    const latest = run({
      id: 4,
      status: 'failure',
      recordsProcessed: 0,
      durationMs: 120,
      errorMessage: 'coingecko: gave up',
    });

    const report = analyzeRun(latest, baseline);

    expect(report.status).toBe('anomaly_detected');
    expect(report.anomalies).toEqual(['critical failure: coingecko: gave up', 'data gap']);
  });

  it('should fall back to the status when a failed run has no message', () => {
    const report = analyzeRun(run({ id: 4, status: 'failed', errorMessage: null }), baseline);

    expect(report.anomalies).toEqual(['critical failure: failed']);
  });

  it('should not flag a data gap when the baseline had no records either', () => {
    const empty = [run({ id: 1, recordsProcessed: 0 })];

    expect(analyzeRun(run({ id: 2, recordsProcessed: 0 }), empty).anomalies).toEqual([]);
  });

  it('should round averages to two decimals', () => {
    const uneven = [run({ id: 1, durationMs: 100 }), run({ id: 2, durationMs: 101 }), run({ id: 3, durationMs: 101 })];

    expect(analyzeRun(run({ id: 4, durationMs: 100 }), uneven).metrics.avgDurationMs).toBe(100.67);
  });
});
