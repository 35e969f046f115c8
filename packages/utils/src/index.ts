export { createLogger, logger, LogLevels, setLogLevel } from './logger'
export type { ConsolaInstance, LogType } from './logger'
