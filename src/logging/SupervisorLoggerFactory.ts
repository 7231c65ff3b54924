import { createLogger, format, transports, type Logger } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type TransportStream from 'winston-transport';

interface SupervisorLoggerOptions {
  /** Rotated audit log of supervisor messages, e.g. `logs/supervisor-%DATE%.log`. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  colorize?: boolean;
}

export const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

export class SupervisorLoggerFactory {
  private readonly level: string;
  private readonly colorize: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: SupervisorLoggerOptions = {}) {
    this.level = level;
    this.colorize = options.colorize ?? Boolean(process.stdout.isTTY);
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
    }
  }

  public createLogger(label: string): Logger {
    return createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    });
  }

  protected createTransports(label: string): TransportStream[] {
    const consoleFormat = this.colorize ?
      format.combine(format.colorize(), this.getFormat(label)) :
      this.getFormat(label);
    const list: TransportStream[] = [
      new transports.Console({
        format: consoleFormat,
        stderrLevels: [ 'error' ],
      }),
    ];
    if (this.fileTransport) {
      list.push(this.fileTransport);
    }
    return list;
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp({ format: TIMESTAMP_FORMAT }),
      format.printf(
        ({ level, message, label: labelInner, timestamp }: TransformableInfo): string =>
          `${String(timestamp)} [${String(labelInner)}] ${level}: ${String(message)}`,
      ),
    );
  }
}

export function createSupervisorLogger(label: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const factory = new SupervisorLoggerFactory(env.KB_LOG_LEVEL?.trim() || 'info', {
    fileName: env.KB_SUPERVISOR_LOG?.trim() || undefined,
  });
  return factory.createLogger(label);
}
