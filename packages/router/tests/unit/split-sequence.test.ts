import { describe, expect, it } from 'vitest';

import { InvalidSeparatorError } from '../../src/errors/errors';
import {
  SplitMaxSplitsSequence,
  SplitSequence,
  segmentRanges,
  splitPath,
} from '../../src/segmenter/split-sequence';

describe('SplitSequence :: unbounded', () => {
  it('should collapse leading, trailing and repeated separators', () => {
    expect(splitPath('/a//b/')).toEqual(['a', 'b']);
    expect(splitPath('a/b')).toEqual(['a', 'b']);
    expect(splitPath('/a//b///c')).toEqual(['a', 'b', 'c']);
  });

  it('should yield nothing for empty and separator-only paths', () => {
    expect(splitPath('')).toEqual([]);
    expect(splitPath('/')).toEqual([]);
    expect(splitPath('///')).toEqual([]);
  });

  it('should keep a path without separators as one segment', () => {
    expect(splitPath('single')).toEqual(['single']);
  });

  it('should split on custom separators', () => {
    expect(splitPath('a.b..c', '.')).toEqual(['a', 'b', 'c']);
    expect(splitPath(':host:port:', ':')).toEqual(['host', 'port']);
    expect(splitPath('  hello   world ', ' ')).toEqual(['hello', 'world']);
    expect(splitPath('a→b→→c', '→')).toEqual(['a', 'b', 'c']);
  });

  it('should accept a separator outside the basic plane', () => {
    expect(splitPath('one😀two😀', '😀')).toEqual(['one', 'two']);
  });

  it('should restart from the beginning on every iteration', () => {
    const sequence = new SplitSequence('/x/y/z');

    expect([...sequence]).toEqual(['x', 'y', 'z']);
    expect([...sequence]).toEqual(['x', 'y', 'z']);
  });

  it('should keep separately obtained iterators independent', () => {
    const sequence = new SplitSequence('/x/y/z');
    const first = sequence[Symbol.iterator]();
    const second = sequence[Symbol.iterator]();

    expect(first.next().value).toBe('x');
    expect(first.next().value).toBe('y');
    expect(second.next().value).toBe('x');
    expect(first.next().value).toBe('z');
    expect(second.next().value).toBe('y');
  });

  it('should stay exhausted once the last segment was read', () => {
    const iterator = new SplitSequence('/only')[Symbol.iterator]();

    expect(iterator.next()).toEqual({ value: 'only', done: false });
    expect(iterator.next().done).toBe(true);
    expect(iterator.next().done).toBe(true);
  });

  it('should report segment offsets into the source', () => {
    expect(segmentRanges('/ab//cd/')).toEqual([
      { start: 1, end: 3 },
      { start: 5, end: 7 },
    ]);
  });
});

describe('SplitSequence :: bounded', () => {
  it('should keep the remainder verbatim after the split limit', () => {
    expect(splitPath('/test/this/string/works/fine', '/', 3)).toEqual(['test', 'this', 'string', 'works/fine']);
  });

  it('should keep inner repeated separators in the remainder', () => {
    expect(splitPath('/a/b//c///d', '/', 1)).toEqual(['a', 'b//c///d']);
  });

  it('should return the whole trimmed-left path when no splits are allowed', () => {
    expect(splitPath('//a/b/', '/', 0)).toEqual(['a/b/']);
  });

  it('should behave like the unbounded sequence when the limit is never reached', () => {
    expect(splitPath('/a/b/c/', '/', 10)).toEqual(['a', 'b', 'c']);
  });

  it('should yield nothing for separator-only input', () => {
    expect([...new SplitMaxSplitsSequence('////', '/', 2)]).toEqual([]);
  });

  it('should reject a negative or fractional split count', () => {
    expect(() => new SplitMaxSplitsSequence('/a', '/', -1)).toThrow(RangeError);
    expect(() => new SplitMaxSplitsSequence('/a', '/', 1.5)).toThrow(RangeError);
  });
});

describe('SplitSequence :: separator validation', () => {
  it('should reject empty and multi-character separators', () => {
    expect(() => new SplitSequence('/a', '')).toThrow(InvalidSeparatorError);
    expect(() => new SplitSequence('/a', '//')).toThrow("Separator must be exactly one character, received '//'");
  });
});
