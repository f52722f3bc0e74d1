export * from './base.adapter';
export * from './coinpaprika.adapter';
export * from './coingecko.adapter';

/** Injection token for the list of adapters a scheduled run fans out to */
export const FETCH_ADAPTERS = Symbol('FETCH_ADAPTERS');
