import { DEFAULT_SEPARATOR } from '../constants';
import { InvalidSeparatorError } from '../errors/errors';
import type { SegmentRange } from '../types';

/**
 * Lazy, restartable sequence of the non-empty segments of `source`.
 *
 * Leading, trailing and repeated separators produce nothing, so `"/a//b/"`
 * and `"a/b"` both yield `a`, `b`. Every iteration starts from the beginning
 * and iterators obtained separately never share a position.
 */
export class SplitSequence implements Iterable<string> {
  readonly source: string;
  readonly separator: string;

  constructor(source: string, separator: string = DEFAULT_SEPARATOR) {
    assertSeparator(separator);
    this.source = source;
    this.separator = separator;
  }

  *[Symbol.iterator](): IterableIterator<string> {
    for (const range of this.ranges()) {
      yield this.source.slice(range.start, range.end);
    }
  }

  ranges(): IterableIterator<SegmentRange> {
    return scanRanges(this.source, this.separator, Number.POSITIVE_INFINITY);
  }
}

/**
 * Like {@link SplitSequence} for the first `maxSplits` segments, then yields
 * the untouched remainder of the source (inner separators included) as one
 * final segment.
 */
export class SplitMaxSplitsSequence implements Iterable<string> {
  readonly source: string;
  readonly separator: string;
  readonly maxSplits: number;

  constructor(source: string, separator: string, maxSplits: number) {
    assertSeparator(separator);
    if (!Number.isInteger(maxSplits) || maxSplits < 0) {
      throw new RangeError(`maxSplits must be a non-negative integer, received ${maxSplits}`);
    }
    this.source = source;
    this.separator = separator;
    this.maxSplits = maxSplits;
  }

  *[Symbol.iterator](): IterableIterator<string> {
    for (const range of this.ranges()) {
      yield this.source.slice(range.start, range.end);
    }
  }

  ranges(): IterableIterator<SegmentRange> {
    return scanRanges(this.source, this.separator, this.maxSplits);
  }
}

export function splitPath(path: string, separator?: string): string[];
export function splitPath(path: string, separator: string, maxSplits: number): string[];
export function splitPath(path: string, separator: string = DEFAULT_SEPARATOR, maxSplits?: number): string[] {
  if (maxSplits === undefined) {
    return Array.from(new SplitSequence(path, separator));
  }
  return Array.from(new SplitMaxSplitsSequence(path, separator, maxSplits));
}

export function segmentRanges(path: string, separator: string = DEFAULT_SEPARATOR): SegmentRange[] {
  return Array.from(new SplitSequence(path, separator).ranges());
}

export function assertSeparator(separator: string): void {
  // counts code points, so a surrogate pair is one character
  if ([...separator].length !== 1) {
    throw new InvalidSeparatorError(separator);
  }
}

function* scanRanges(source: string, separator: string, maxSplits: number): IterableIterator<SegmentRange> {
  let index = skipSeparators(source, separator, 0);
  let availableSplits = maxSplits;

  while (index < source.length) {
    if (availableSplits === 0) {
      yield { start: index, end: source.length };
      return;
    }

    const found = source.indexOf(separator, index);
    const end = found === -1 ? source.length : found;
    yield { start: index, end };

    availableSplits--;
    index = skipSeparators(source, separator, end);
  }
}

function skipSeparators(source: string, separator: string, from: number): number {
  let index = from;
  while (source.startsWith(separator, index)) {
    index += separator.length;
  }
  return index;
}
