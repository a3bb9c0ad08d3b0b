import type { Loggable } from './interfaces';

export function isLoggable(value: unknown): value is Loggable {
  return typeof value === 'object' && value !== null && 'toLog' in value && typeof value.toLog === 'function';
}
