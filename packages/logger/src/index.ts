export {
  createLogger,
  parseLogLevel,
  consoleSink,
  stdioSink,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogFields,
  type LogSink,
} from './logger'
