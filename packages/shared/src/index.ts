export * from './types/dates'
export * from './types/evaluation'
export * from './types/market-data'
export * from './types/predictions'
