import { bench, group, run } from 'mitata';

import { PathTrieBuilder } from '../src/builder/trie-builder';
import type { PathTrie } from '../src/trie/path-trie';

type RouteFixture = {
  pattern: string;
  sample: string;
};

const ALPHA_LOWER = 'abcdefghijklmnopqrstuvwxyz';
const ALPHANUM_LOWER = 'abcdefghijklmnopqrstuvwxyz0123456789';
const HEX_CHARS = '0123456789abcdef';

let sink = 0;

const literalRoutes = generateLiteralRouteFixtures(10_000, 4, 8);
const parameterRoutes = generateParameterRouteFixtures(6_000);
const catchAllRoutes = generateCatchAllRouteFixtures(1_000);

const literalTrie = buildTrie(literalRoutes);
const parameterTrie = buildTrie(parameterRoutes);
const catchAllTrie = buildTrie(catchAllRoutes);
const caseInsensitiveTrie = buildTrie(literalRoutes, false);

const roundLiteral = makeRoundRobin(literalRoutes.map(fixture => fixture.sample));
const roundParameter = makeRoundRobin(parameterRoutes.map(fixture => fixture.sample));
const roundCatchAll = makeRoundRobin(catchAllRoutes.map(fixture => fixture.sample));
const roundUpperCase = makeRoundRobin(literalRoutes.map(fixture => fixture.sample.toUpperCase()));
const roundMiss = makeRoundRobin(['/missing/route', '/bench/zzzz/unknown/segment/chain']);

group('build', () => {
  bench('build: 10k literal routes', () => consumeTrie(buildTrie(literalRoutes)));
  bench('build: 6k parameter routes', () => consumeTrie(buildTrie(parameterRoutes)));
});

group('resolve', () => {
  bench('resolve: literal 10k trie', () => consumeMatch(literalTrie.resolve(roundLiteral())));
  bench('resolve: parameter-heavy trie', () => consumeMatch(parameterTrie.resolve(roundParameter())));
  bench('resolve: catch-all trie', () => consumeMatch(catchAllTrie.resolve(roundCatchAll())));
  bench('resolve: case-insensitive', () => consumeMatch(caseInsensitiveTrie.resolve(roundUpperCase())));
  bench('resolve: miss', () => consumeMatch(literalTrie.resolve(roundMiss())));
});

await run();

console.log(`[trie bench sink] ${sink.toString(16)}`);

function buildTrie(fixtures: RouteFixture[], caseSensitive = true): PathTrie<number> {
  const builder = new PathTrieBuilder<number>({ caseSensitive });
  fixtures.forEach((fixture, index) => builder.addEntry(fixture.pattern, index));
  return builder.build();
}

function consumeTrie(trie: PathTrie<number>): PathTrie<number> {
  sink ^= trie.size & 0xffff;
  return trie;
}

function consumeMatch(result: ReturnType<PathTrie<number>['resolve']>): void {
  if (!result) {
    sink ^= 1;
    return;
  }
  sink ^= (result.value + result.parameters.size) & 0xffff;
}

function generateLiteralRouteFixtures(count: number, depth: number, segmentLength: number): RouteFixture[] {
  const fixtures: RouteFixture[] = [];
  const next = makeSeededGenerator(count + depth + segmentLength);
  for (let i = 0; i < count; i++) {
    const segments: string[] = [];
    for (let d = 0; d < depth; d++) {
      segments.push(generateToken(next, segmentLength, ALPHANUM_LOWER, i + d * 13));
    }
    const path = `/${segments.join('/')}`;
    fixtures.push({ pattern: path, sample: path });
  }
  return fixtures;
}

function generateParameterRouteFixtures(count: number): RouteFixture[] {
  const fixtures: RouteFixture[] = [];
  const next = makeSeededGenerator(0xbeef);
  for (let i = 0; i < count; i++) {
    const prefix = `/bench/${i.toString(36).padStart(4, '0')}`;
    switch (i % 3) {
      case 0: {
        const userId = generateToken(next, 24, HEX_CHARS);
        const postId = generateToken(next, 24, HEX_CHARS);
        fixtures.push({
          pattern: `${prefix}/users/:userId/posts/:postId`,
          sample: `${prefix}/users/${userId}/posts/${postId}`,
        });
        break;
      }
      case 1: {
        const name = generateToken(next, 10, ALPHA_LOWER);
        fixtures.push({ pattern: `${prefix}/files/{name}.json`, sample: `${prefix}/files/${name}.json` });
        break;
      }
      default: {
        const tenant = generateToken(next, 12, ALPHANUM_LOWER);
        fixtures.push({ pattern: `${prefix}/tenants/*/settings`, sample: `${prefix}/tenants/${tenant}/settings` });
        break;
      }
    }
  }
  return fixtures;
}

function generateCatchAllRouteFixtures(count: number): RouteFixture[] {
  const fixtures: RouteFixture[] = [];
  const next = makeSeededGenerator(0xcafe);
  for (let i = 0; i < count; i++) {
    const prefix = `/assets/${i.toString(36).padStart(3, '0')}`;
    const tail = [generateToken(next, 6, ALPHA_LOWER), generateToken(next, 6, ALPHA_LOWER), 'index.html'];
    fixtures.push({ pattern: `${prefix}/**`, sample: `${prefix}/${tail.join('/')}` });
  }
  return fixtures;
}

function makeRoundRobin(samples: string[]): () => string {
  let index = 0;
  return () => {
    const sample = samples[index] ?? '/';
    index = (index + 1) % samples.length;
    return sample;
  };
}

function makeSeededGenerator(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state;
  };
}

function generateToken(next: () => number, length: number, alphabet: string, salt = 0): string {
  let token = '';
  let state = salt;
  for (let i = 0; i < length; i++) {
    state ^= next();
    token += alphabet.charAt((state >>> 0) % alphabet.length);
  }
  return token;
}
