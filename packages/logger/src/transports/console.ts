import { inspect } from 'node:util';

import { isLoggable } from '../helpers';
import type { LoggerOptions, LogMessage, Transport } from '../interfaces';
import type { Color, LogLevel, LogMetadataRecord, LogMetadataValue } from '../types';

const DEFAULT_COLORS: Record<LogLevel, Color> = {
  trace: 'gray',
  debug: 'blue',
  info: 'green',
  warn: 'yellow',
  error: 'red',
  fatal: 'magenta',
};

// ANSI Color Codes
const RESET = '\x1b[0m';
const COLORS: Record<Color, string> = {
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

export class ConsoleTransport implements Transport {
  constructor(private readonly options: LoggerOptions = {}) {}

  log(message: LogMessage): void {
    const format = this.options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');

    if (format === 'json') {
      this.logJson(message);
    } else {
      this.logPretty(message);
    }
  }

  private logJson(message: LogMessage): void {
    const replacer = (_key: string, value: unknown): unknown => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
      }
      if (isLoggable(value)) {
        return value.toLog();
      }
      return value;
    };

    process.stdout.write(JSON.stringify(message, replacer) + '\n');
  }

  private logPretty(message: LogMessage): void {
    const { level, time, msg, context, err, ...rest } = message;

    const date = new Date(time);
    const timeStr = [date.getHours(), date.getMinutes(), date.getSeconds()].map(part => part.toString().padStart(2, '0')).join(':');
    const timeColored = `${COLORS.gray}${timeStr}${RESET}`;

    const color = this.options.prettyOptions?.colors?.[level] ?? DEFAULT_COLORS[level];
    const levelCode = COLORS[color];
    const levelStr = `${levelCode}${level.toUpperCase().padEnd(5)}${RESET}`;

    const contextStr = context ? `[${COLORS.cyan}${context}${RESET}] ` : '';
    const line = `${timeColored} ${levelStr} ${contextStr}${levelCode}${msg}${RESET}`;

    if (level === 'error' || level === 'fatal') {
      console.error(line);
    } else {
      console.log(line);
    }

    if (err) {
      console.error(err);
    }

    if (Object.keys(rest).length > 0) {
      const processedRest: LogMetadataRecord = {};
      for (const [key, val] of Object.entries(rest)) {
        processedRest[key] = expandLoggable(val);
      }
      console.log(inspect(processedRest, { colors: true, depth: 2 }));
    }
  }
}

function expandLoggable(value: LogMetadataValue): LogMetadataValue {
  return isLoggable(value) ? value.toLog() : value;
}
