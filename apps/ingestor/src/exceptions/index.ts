export * from './ingestion.exception';
export * from './http-exception.mapper';
