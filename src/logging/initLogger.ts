import { setGlobalLoggerFactory } from 'global-logger-factory';

import { DEFAULT_LOG_LEVEL, type LoggingOptions } from '../config/EngineOptions';
import { ConfigurableLoggerFactory } from './ConfigurableLoggerFactory';

/**
 * Installs the winston-backed logger factory for every `getLoggerFor` call.
 */
export function initLogger(options: LoggingOptions = {}): ConfigurableLoggerFactory {
  const loggerFactory = new ConfigurableLoggerFactory(options.logLevel ?? DEFAULT_LOG_LEVEL, {
    fileName: options.logFile,
    showLocation: true,
  });
  setGlobalLoggerFactory(loggerFactory);
  return loggerFactory;
}
