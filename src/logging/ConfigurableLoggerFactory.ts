import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Rotating log file pattern; console only when unset. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  showLocation?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly showLocation: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.showLocation = options.showLocation ?? false;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared by every logger
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): Transport[] {
    const consoleTransport = new transports.Console({
      format: format.combine(
        format.colorize(),
        this.getFormat(label),
      ),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.queryId) {
          info.queryId = store.queryId;
        }
        return info;
      })(),
      format.printf(
        ({ level: levelInner, message, label: labelInner, timestamp, queryId }: TransformableInfo): string => {
          const queryInfo = typeof queryId === 'string' ? ` [Query:${queryId}]` : '';
          return `${String(timestamp)}${queryInfo} [${this.displayLabel(labelInner)}] ${levelInner}: ${String(message)}`;
        },
      ),
    );
  }

  /**
   * With `showLocation` only the class name of a path-like label is shown.
   */
  private displayLabel(label: unknown): string {
    const text = typeof label === 'string' ? label : '';
    if (this.showLocation && text) {
      const className = text.split('/').pop();
      if (className && className !== 'Object') {
        return className;
      }
    }
    return text;
  }
}
