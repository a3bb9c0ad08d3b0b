import type { Color, LogFormat, LogLevel, LogMetadataRecord } from './types';

// Base fields always present
export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  err?: Error | Loggable;
}

// User-defined fields merged at root level
export type LogMessage = BaseLogMessage & LogMetadataRecord;

export interface Loggable {
  toLog(): LogMetadataRecord;
}

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info'
   */
  level?: LogLevel;
  /**
   * Log format. Pretty in development, json when NODE_ENV is production.
   */
  format?: LogFormat;
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
  /**
   * Replaces the console transport, e.g. to collect messages in memory.
   */
  transport?: Transport;
}

export interface Transport {
  log(message: LogMessage): void;
}
