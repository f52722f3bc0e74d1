export * from './price-observation.interface';
export * from './job-run.interface';
export * from './checkpoint.interface';
export * from './anomaly-report.interface';
export * from './retry-policy.interface';
export * from './fetch-adapter.interface';
