export {
  initLogger,
  getLogger,
  flushLoggers,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export {
  loggerEnvSchema,
  resolveLogColor,
  resolveLogLevel,
  validateLoggerEnv,
  type LoggerEnvConfig,
} from './env.schema.js';
