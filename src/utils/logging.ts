import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { loggingConfig } from '../connections/config/app.config';

export type Logger = winston.Logger;

interface LoggingOptions {
  level: string;
  dir: string;
  toFile: boolean;
  silent: boolean;
  rotation: string;
  retention: string;
}

class LoggingConfig {
  private readonly options: LoggingOptions;
  private readonly logDir: string;

  constructor(options: LoggingOptions) {
    this.options = options;
    this.logDir = path.resolve(process.cwd(), options.dir);

    if (options.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private getCallerInfo(): { file?: string; line?: number; function?: string } {
    const originalFunc = Error.prepareStackTrace;
    let frames: NodeJS.CallSite[] = [];

    try {
      Error.prepareStackTrace = (_err, stack) => {
        frames = stack;
        return '';
      };
      const marker = new Error();
      void marker.stack;
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    // Skip getCallerInfo itself and the winston format function
    for (const frame of frames.slice(2)) {
      const file = frame.getFileName();
      if (file && !file.includes('node_modules') && !file.includes('winston') && !file.endsWith('logging.ts')) {
        return {
          file,
          line: frame.getLineNumber() ?? undefined,
          function: frame.getFunctionName() || 'anonymous',
        };
      }
    }

    return {};
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackLabel: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const callerInfo = this.getCallerInfo();
    const location = callerInfo.file && callerInfo.line
      ? ` | ${callerInfo.file}:${callerInfo.line}${callerInfo.function ? ` (${callerInfo.function})` : ''}`
      : '';

    const stackStr = stack ? `\n${stackLabel}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${location}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
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

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private fileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.options.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.options.retention),
      zippedArchive: true,
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
      silent: this.options.silent,
    });

    logger.add(new winston.transports.Console({
      level: this.options.level,
      format: this.createConsoleFormat(),
    }));

    if (this.options.toFile) {
      logger.add(this.fileTransport('sys'));
      logger.add(this.fileTransport('error', 'error'));
      // Combined file keeps every level
      logger.add(this.fileTransport('combined', 'silly'));
    }

    return logger;
  }
}

export const logger = new LoggingConfig(loggingConfig).setupLogging();

/**
 * Named child logger; the name lands in every line's metadata.
 */
export const getLogger = (name: string): Logger => logger.child({ module: name });
