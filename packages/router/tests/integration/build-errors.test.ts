import { Logger, type LogMessage, type Transport } from '@waymark/logger';
import { afterEach, describe, expect, it } from 'vitest';

import { PathTrieBuilder } from '../../src/builder/trie-builder';
import { BuilderFinalizedError, RouteBuildError, RouterConfigError } from '../../src/errors/errors';
import type { RouteBuildErrorReason } from '../../src/types';

class CollectingTransport implements Transport {
  readonly messages: LogMessage[] = [];

  log(message: LogMessage): void {
    this.messages.push(message);
  }
}

function reasonOf(action: () => unknown): RouteBuildErrorReason | undefined {
  try {
    action();
  } catch (error) {
    if (error instanceof RouteBuildError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

describe('PathTrieBuilder :: lifecycle', () => {
  it('should reject every mutation after build', () => {
    const builder = new PathTrieBuilder<number>();
    builder.addEntry('/a', 1);
    builder.build();

    expect(() => builder.addEntry('/b', 2)).toThrow(BuilderFinalizedError);
    expect(() => builder.addEntries([['/c', 3]])).toThrow(BuilderFinalizedError);
    expect(() => builder.validate()).toThrow(BuilderFinalizedError);
    expect(() => builder.build()).toThrow(
      'PathTrieBuilder has already been built. Instantiate a new builder for additional routes.',
    );
  });

  it('should register entries in order and return their keys', () => {
    const builder = new PathTrieBuilder<string>();
    const keys = builder.addEntries([
      ['/a', 'a'],
      ['/b/:id', 'b'],
      ['/a', 'a2'],
    ]);

    expect(keys).toEqual([0, 1, 0]);
    expect(builder.routes()).toEqual([
      { key: 0, pattern: '/a', value: 'a2' },
      { key: 1, pattern: '/b/:id', value: 'b' },
    ]);
  });

  it('should not let later registrations change a built trie', () => {
    const builder = new PathTrieBuilder<string>();
    builder.addEntry('/a', 'a');
    const trie = builder.build();

    expect(trie.resolve('/a')?.value).toBe('a');
    expect(trie.resolve('/b')).toBeNull();
  });

  it('should reject invalid options', () => {
    expect(() => new PathTrieBuilder({ separator: '' })).toThrow(RouterConfigError);
  });
});

describe('PathTrieBuilder :: structural errors', () => {
  it('should surface malformed patterns as build errors', () => {
    const builder = new PathTrieBuilder<number>();

    expect(reasonOf(() => builder.addEntry('/a/**/b', 1))).toBe('catch-all-not-terminal');
    expect(reasonOf(() => builder.addEntry('/a/:', 1))).toBe('empty-parameter-name');
    expect(reasonOf(() => builder.addEntry('/a/{x}{y}', 1))).toBe('ambiguous-partial');
  });

  it('should reject re-registering a pattern with dynamic components', () => {
    const builder = new PathTrieBuilder<number>();
    builder.addEntry('/users/:id', 1);
    builder.addEntry('/files/*', 2);
    builder.addEntry('/assets/**', 3);

    expect(reasonOf(() => builder.addEntry('/users/:id', 4))).toBe('duplicate-route');
    expect(reasonOf(() => builder.addEntry('/files/{}', 5))).toBe('duplicate-route');
    expect(() => builder.addEntry('/assets/**', 6)).toThrow("Conflict: route '/assets/**' is already registered");
  });

  it('should leave the trie untouched after a rejected registration', () => {
    const builder = new PathTrieBuilder<number>();
    builder.addEntry('/users/:id', 1);

    expect(() => builder.addEntry('/users/:id', 2)).toThrow(RouteBuildError);
    expect(builder.routes()).toHaveLength(1);

    const trie = builder.build();
    expect(trie.resolve('/users/7')?.value).toBe(1);
  });

  it('should allow different parameter names at the same position', () => {
    const builder = new PathTrieBuilder<string>();
    builder.addEntry('/posts/:id', 'by-id');
    builder.addEntry('/posts/:slug/comments', 'comments');
    const trie = builder.build();

    expect(trie.resolve('/posts/7')?.parameters.toObject()).toEqual({ id: '7' });
    expect(trie.resolve('/posts/hello/comments')?.parameters.toObject()).toEqual({ slug: 'hello' });
  });
});

describe('PathTrieBuilder :: duplicate parameter names', () => {
  afterEach(() => {
    Logger.reset();
  });

  it('should throw under the error policy', () => {
    const builder = new PathTrieBuilder<number>({ duplicateParamPolicy: 'error' });

    expect(reasonOf(() => builder.addEntry('/:id/x/:id', 1))).toBe('duplicate-parameter');
    expect(() => builder.addEntry('/{id}.json/:id', 1)).toThrow("Duplicate parameter name 'id' in '/{id}.json/:id'");
  });

  it('should warn under the default policy', () => {
    const transport = new CollectingTransport();
    Logger.configure({ level: 'warn', transport });
    const builder = new PathTrieBuilder<number>();

    builder.addEntry('/:id/x/:id', 1);

    expect(transport.messages).toHaveLength(1);
    expect(transport.messages[0]).toMatchObject({
      level: 'warn',
      context: 'PathTrie',
      msg: 'Duplicate parameter name, the deepest binding wins',
      pattern: '/:id/x/:id',
      name: 'id',
    });
  });

  it('should stay quiet under the silent policy', () => {
    const transport = new CollectingTransport();
    Logger.configure({ level: 'trace', transport });
    const builder = new PathTrieBuilder<number>({ duplicateParamPolicy: 'silent' });

    builder.addEntry('/:id/x/:id', 1);

    expect(transport.messages.map(message => message.msg)).toEqual(['Route registered']);
  });
});

describe('PathTrieBuilder :: logging', () => {
  afterEach(() => {
    Logger.reset();
  });

  it('should log registration, overwrite and build through the configured logger', () => {
    const transport = new CollectingTransport();
    Logger.configure({ level: 'debug', transport });
    const builder = new PathTrieBuilder<number>({ logger: new Logger('Routes') });

    builder.addEntry('/a', 1);
    builder.addEntry('/a', 2);
    builder.build();

    expect(transport.messages.map(({ level, msg, context }) => [level, msg, context])).toEqual([
      ['debug', 'Route registered', 'Routes'],
      ['warn', 'Route overwritten', 'Routes'],
      ['debug', 'Trie built', 'Routes'],
    ]);
    expect(transport.messages[2]).toMatchObject({ routes: 1, nodes: 2 });
  });
});
