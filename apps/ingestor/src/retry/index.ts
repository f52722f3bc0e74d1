export * from './error-classifier';
export * from './retry-executor';
