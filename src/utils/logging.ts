import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { appConfig } from '../connections/config/app.config';

interface LoggingOptions {
  level: string;
  logDir: string;
  maxSize: string;
  retention: string;
  compression: boolean;
  silent: boolean;
}

class LoggingConfig {
  private readonly options: LoggingOptions;

  constructor(options: Partial<LoggingOptions> = {}) {
    this.options = {
      level: appConfig.logLevel,
      logDir: path.resolve(appConfig.logDir),
      maxSize: '10m',
      retention: '30d',
      compression: true,
      silent: appConfig.nodeEnv === 'test',
      ...options,
    };
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private createRotatingFile(name: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.options.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.options.maxSize,
      maxFiles: this.options.retention,
      zippedArchive: this.options.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.options.level,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.options.level,
      format: this.createConsoleFormat(),
      silent: this.options.silent,
    }));

    // No file transports under test
    if (!this.options.silent) {
      logger.add(this.createRotatingFile('combined'));
      logger.add(this.createRotatingFile('error', 'error'));
    }

    return logger;
  }
}

export const logger = new LoggingConfig().setupLogging();

export const getLogger = (module: string): winston.Logger => logger.child({ module });
