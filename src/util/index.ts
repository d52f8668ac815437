export { log, isLogLevel, type LogLevel, type LogEntry } from './logger'
export { backoffDelay, delay, retry, timeout } from './async'
export { applyLogLevel, flagValue, positionals } from './args'
