export { closeLoggers, createLogger, describeError, NoopLogger } from './logger'
export type { Logger } from './logger'
export { ProviderTimeoutError, withTimeout } from './with-timeout'
