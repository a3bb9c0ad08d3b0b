import { isLoggable } from './helpers';
import type { LoggerOptions, LogMessage, Transport } from './interfaces';
import { ConsoleTransport } from './transports/console';
import type { LogArgument, LogLevel } from './types';

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

const defaultOptions = (): LoggerOptions => ({
  level: 'info',
  format: process.env.NODE_ENV === 'production' ? 'json' : undefined,
});

export class Logger {
  private static globalOptions: LoggerOptions = defaultOptions();
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);

  readonly context?: string;

  constructor(context?: string | object) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions): void {
    this.globalOptions = { ...this.globalOptions, ...options };
    this.transport = this.globalOptions.transport ?? new ConsoleTransport(this.globalOptions);
  }

  /**
   * Restores the defaults (level `info`, console transport).
   */
  static reset(): void {
    this.globalOptions = defaultOptions();
    this.transport = new ConsoleTransport(this.globalOptions);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]): void {
    this.log('trace', msg, args);
  }

  debug(msg: string, ...args: LogArgument[]): void {
    this.log('debug', msg, args);
  }

  info(msg: string, ...args: LogArgument[]): void {
    this.log('info', msg, args);
  }

  warn(msg: string, ...args: LogArgument[]): void {
    this.log('warn', msg, args);
  }

  error(msg: string, ...args: LogArgument[]): void {
    this.log('error', msg, args);
  }

  fatal(msg: string, ...args: LogArgument[]): void {
    this.log('fatal', msg, args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = Logger.globalOptions.level ?? 'info';
    return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, args: LogArgument[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const logMessage: LogMessage = {
      level,
      msg,
      time: Date.now(),
      context: this.context,
    };

    for (const arg of args) {
      if (arg instanceof Error) {
        logMessage.err = arg;
      } else if (isLoggable(arg)) {
        Object.assign(logMessage, arg.toLog());
      } else {
        Object.assign(logMessage, arg);
      }
    }

    Logger.transport.log(logMessage);
  }
}
