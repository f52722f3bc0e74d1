export * from './pagination-query.dto';
export * from './run-history-query.dto';
export * from './batch-ingestion.dto';
export * from './live-run.dto';
