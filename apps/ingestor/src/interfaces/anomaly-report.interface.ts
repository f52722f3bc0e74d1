export type AnomalyStatus = 'baseline_building' | 'normal' | 'anomaly_detected';

export interface AnomalyMetrics {
  latestDurationMs: number;
  avgDurationMs: number;
  avgRecordsProcessed: number;
  baselineSize: number;
}

export interface AnomalyReport {
  latestRunId: number;
  status: AnomalyStatus;
  anomalies: string[];
  /** Empty while the baseline is still building */
  metrics: Partial<AnomalyMetrics>;
}
