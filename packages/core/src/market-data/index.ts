export { CsvPriceHistoryProvider } from './csv-price-history-provider'
export type { CsvPriceHistoryProviderOptions } from './csv-price-history-provider'
