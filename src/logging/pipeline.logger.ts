import { LoggerService } from '@nestjs/common';
import { once } from 'node:events';
import { createWriteStream, openSync, WriteStream } from 'node:fs';
import {
  Logger as WinstonLogger,
  createLogger,
  format,
  transports,
} from 'winston';
import { ConfigError, describeError } from '../common/pipeline.errors';
import { LOG_LEVELS, LogLevelName } from '../config/pipeline-config.loader';

/** winston priorities: lower is more severe */
const SEVERITY: Record<LogLevelName, number> = {
  critical: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4,
};

export interface PipelineLoggerOptions {
  level: LogLevelName;
  /** Append log lines to this file */
  logfile?: string;
  /** Also write to stderr (or the given stream) */
  verbose: boolean;
  stderr?: NodeJS.WritableStream;
  now?: () => Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function formatMessage(message: unknown): string {
  if (typeof message === 'string') return message;
  if (message instanceof Error) return describeError(message);
  try {
    return JSON.stringify(message) ?? String(message);
  } catch {
    return String(message);
  }
}

function lineFormat(now: () => Date) {
  return format.combine(
    format.timestamp({ format: () => formatTimestamp(now()) }),
    format.printf((info) => {
      const context = typeof info.context === 'string' ? info.context : '';
      const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
      return (
        `${String(info.timestamp)} [${process.pid}] ${info.level.toUpperCase()}: ` +
        `${context ? `${context}: ` : ''}${String(info.message)}${stack}`
      );
    }),
  );
}

/**
 * PipelineLogger - LoggerService behind every `new Logger(X.name)`
 *
 * A winston logger writing `2025-06-01 12:00:05 [4242] WARNING: PipelineEngine:
 * message` lines to the logfile and, when verbose, to stderr. Stdout stays
 * free for the print output. Nest's `log` is INFO, `verbose` is DEBUG and
 * `fatal` is CRITICAL.
 */
export class PipelineLogger implements LoggerService {
  private readonly logger: WinstonLogger;
  private readonly file: WriteStream | null = null;
  private readonly debugging: boolean;

  constructor(options: PipelineLoggerOptions) {
    const now = options.now ?? (() => new Date());

    if (options.logfile) {
      // Opened here so an unusable path fails startup, not a later write
      let fd: number;
      try {
        fd = openSync(options.logfile, 'a');
      } catch (error) {
        throw new ConfigError(
          `Could not open logfile ${options.logfile}: ${describeError(error)}`,
          { cause: error },
        );
      }
      this.file = createWriteStream(options.logfile, { fd, flags: 'a' });
    }

    const sinks = [
      ...(this.file ? [new transports.Stream({ stream: this.file })] : []),
      ...(options.verbose
        ? [
            options.stderr
              ? new transports.Stream({ stream: options.stderr })
              : new transports.Console({ stderrLevels: [...LOG_LEVELS] }),
          ]
        : []),
    ];

    this.debugging = options.level === 'debug';
    this.logger = createLogger({
      levels: SEVERITY,
      level: options.level,
      format: lineFormat(now),
      transports: sinks,
      // quiet run without a logfile
      silent: sinks.length === 0,
    });
    this.logger.on('error', (error: unknown) => {
      process.stderr.write(
        `telemetry-pipe: logging failed: ${describeError(error)}\n`,
      );
    });
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warning', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('critical', message, optionalParams);
  }

  isEnabled(level: LogLevelName): boolean {
    return this.logger.isLevelEnabled(level);
  }

  /**
   * Flush every sink and release the logfile.
   */
  async close(): Promise<void> {
    const drained = this.logger.transports.map((sink) => once(sink, 'finish'));
    this.logger.end();
    await Promise.all(drained);
    if (this.file) {
      this.file.end();
      await once(this.file, 'close');
    }
  }

  private write(
    level: LogLevelName,
    message: unknown,
    optionalParams: unknown[],
  ): void {
    if (!this.isEnabled(level)) return;

    // Nest passes the context last; error() may put a stack before it
    const params = [...optionalParams];
    const context =
      typeof params[params.length - 1] === 'string' ? String(params.pop()) : '';
    const stack = params.find(
      (param): param is string =>
        typeof param === 'string' && param.includes('\n'),
    );

    this.logger.log({
      level,
      message: formatMessage(message),
      context,
      ...(stack && this.debugging ? { stack } : {}),
    });
  }
}
