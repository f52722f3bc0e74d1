import { AnomalyReport, JobRun } from '../interfaces';

/** Successful runs kept in the comparison baseline */
export const BASELINE_WINDOW = 10;

export const DURATION_SPIKE_MULTIPLIER = 2;

/** A spike must also exceed this absolute duration, so near-zero baselines do not flag noise */
export const DURATION_SPIKE_FLOOR_MS = 500;

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Compare the latest run against a baseline of earlier successful runs.
 * Every check is evaluated independently; several flags may co-occur.
 */
export function analyzeRun(latest: JobRun, history: JobRun[]): AnomalyReport {
  if (history.length === 0) {
    return {
      latestRunId: latest.id,
      status: 'baseline_building',
      anomalies: [],
      metrics: {},
    };
  }

  const latestDuration = latest.durationMs ?? 0;
  const avgDuration = mean(history.map((run) => run.durationMs ?? 0));
  const avgRecords = mean(history.map((run) => run.recordsProcessed));

  const anomalies: string[] = [];
  if (latest.status !== 'success') {
    anomalies.push(`critical failure: ${latest.errorMessage ?? latest.status}`);
  }
  if (latestDuration > avgDuration * DURATION_SPIKE_MULTIPLIER && latestDuration > DURATION_SPIKE_FLOOR_MS) {
    anomalies.push('duration spike');
  }
  if (latest.recordsProcessed === 0 && avgRecords > 0) {
    anomalies.push('data gap');
  }

  return {
    latestRunId: latest.id,
    status: anomalies.length > 0 ? 'anomaly_detected' : 'normal',
    anomalies,
    metrics: {
      latestDurationMs: latestDuration,
      avgDurationMs: round2(avgDuration),
      avgRecordsProcessed: round2(avgRecords),
      baselineSize: history.length,
    },
  };
}
