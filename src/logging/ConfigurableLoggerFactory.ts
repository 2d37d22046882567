import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type * as Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';

interface ConfigurableLoggerOptions {
  /** Rotated log file pattern; console only when omitted */
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
        maxSize: options.maxSize || '10m',
        maxFiles: options.maxFiles || '14d',
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
      // Records go to stdout, logs to stderr
      stderrLevels: [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ],
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
      format.printf(({ level, message, label: labelInner, timestamp }: TransformableInfo): string => {
        let displayLabel = String(labelInner ?? '');
        if (this.showLocation && displayLabel) {
          const className = displayLabel.split('/').pop();
          if (className && className !== 'Object') {
            displayLabel = className;
          }
        }
        return `${String(timestamp)} [${displayLabel}] ${level}: ${String(message)}`;
      }),
    );
  }
}
