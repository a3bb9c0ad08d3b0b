import type { ParamParser } from '../types';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const integer: ParamParser<number> = raw => {
  if (!INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
};

const number: ParamParser<number> = raw => {
  if (raw.trim().length === 0) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

const boolean: ParamParser<boolean> = raw => {
  if (raw === 'true') {
    return true;
  }
  if (raw === 'false') {
    return false;
  }
  return undefined;
};

// Normalized to lower case
const uuid: ParamParser<string> = raw => (UUID_PATTERN.test(raw) ? raw.toLowerCase() : undefined);

function oneOf<T extends string>(values: readonly T[]): ParamParser<T> {
  return raw => values.find(value => value === raw);
}

export const paramParsers = {
  integer,
  number,
  boolean,
  uuid,
  oneOf,
};
