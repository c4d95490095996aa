export {
  Logger,
  createLogger,
  createSilentLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logger.js';
