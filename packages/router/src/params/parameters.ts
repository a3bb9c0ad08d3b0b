import { BadRequestError } from '../errors/errors';
import type { ParamParser } from '../types';

/**
 * Values captured while resolving a path.
 *
 * A name bound more than once keeps every binding in path order; lookups
 * return the deepest one. The catch-all tail is kept apart from named
 * captures so an absent catch-all can be told from an empty one.
 */
export class Parameters {
  private readonly bindings: ReadonlyArray<readonly [string, string]>;
  private readonly latest: ReadonlyMap<string, string>;
  private readonly catchAll: ReadonlyArray<string> | null;

  constructor(bindings: Iterable<readonly [string, string]> = [], catchAll: readonly string[] | null = null) {
    this.bindings = Object.freeze(Array.from(bindings, ([name, value]) => [name, value] as const));
    this.latest = new Map(this.bindings);
    this.catchAll = catchAll === null ? null : Object.freeze([...catchAll]);
  }

  get size(): number {
    return this.latest.size;
  }

  get(name: string): string | undefined;
  get<T>(name: string, parse: ParamParser<T>): T | undefined;
  get<T>(name: string, parse?: ParamParser<T>): string | T | undefined {
    const raw = this.latest.get(name);
    if (raw === undefined || parse === undefined) {
      return raw;
    }
    return parse(raw);
  }

  /**
   * Like {@link Parameters.get} but throws `BadRequestError` (400) when the
   * value is missing or the parser rejects it.
   */
  require(name: string): string;
  require<T>(name: string, parse: ParamParser<T>): T;
  require<T>(name: string, parse?: ParamParser<T>): string | T {
    const raw = this.latest.get(name);
    if (raw === undefined) {
      throw new BadRequestError(`Missing parameter '${name}'`);
    }
    if (parse === undefined) {
      return raw;
    }

    const parsed = parse(raw);
    if (parsed === undefined) {
      throw new BadRequestError(`Invalid value for parameter '${name}': '${raw}'`);
    }
    return parsed;
  }

  getAll(name: string): string[] {
    return this.bindings.filter(([key]) => key === name).map(([, value]) => value);
  }

  has(name: string): boolean {
    return this.latest.has(name);
  }

  keys(): string[] {
    return Array.from(this.latest.keys());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.latest.entries());
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.latest);
  }

  getCatchAll(): string[] {
    return this.catchAll === null ? [] : [...this.catchAll];
  }

  hasCatchAll(): boolean {
    return this.catchAll !== null;
  }
}
