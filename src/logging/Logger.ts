import chalk from 'chalk';
import * as fs from 'fs-extra';
import dayjs from 'dayjs';
import { ValidationError } from '../errors';

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warn = 2,
  Error = 3,
  Silent = 4
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function parseLogLevel(value: string): LogLevel {
  switch (value.toLowerCase()) {
    case 'debug': return LogLevel.Debug;
    case 'info': return LogLevel.Info;
    case 'warn': case 'warning': return LogLevel.Warn;
    case 'error': return LogLevel.Error;
    case 'silent': case 'none': return LogLevel.Silent;
    default:
      throw new ValidationError(`Unknown LOG_LEVEL '${value}'`);
  }
}

/**
 * Console output with chalk colours. When a log file is set, every line that
 * passes the level gate is also appended there without colour codes.
 */
export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.Info, private logFile?: string) {
    if (logFile) {
      fs.ensureFileSync(logFile);
    }
  }

  debug(message: string): void {
    this.emit(LogLevel.Debug, chalk.gray(`🔍 ${message}`), message);
  }

  info(message: string): void {
    this.emit(LogLevel.Info, chalk.cyan(message), message);
  }

  success(message: string): void {
    this.emit(LogLevel.Info, chalk.green(`✅ ${message}`), message);
  }

  warn(message: string): void {
    this.emit(LogLevel.Warn, chalk.yellow(`⚠️  ${message}`), `WARN ${message}`);
  }

  error(message: string): void {
    this.emit(LogLevel.Error, chalk.red(`❌ ${message}`), `ERROR ${message}`);
  }

  private emit(level: LogLevel, rendered: string, plain: string): void {
    if (level < this.level) return;
    if (level >= LogLevel.Warn) {
      console.error(rendered);
    } else {
      console.log(rendered);
    }
    if (this.logFile) {
      fs.appendFileSync(this.logFile, `${dayjs().format('YYYY-MM-DD HH:mm:ss')} ${plain}\n`);
    }
  }
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  success: noop,
  warn: noop,
  error: noop
};
