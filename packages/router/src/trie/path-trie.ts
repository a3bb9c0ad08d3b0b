import type { RouteDescription } from '../builder/types';
import type { ImmutableTrieLayout } from '../layout/immutable-trie-layout';
import { TrieMatcher } from '../matcher/matcher';
import { Parameters } from '../params/parameters';
import { splitPath } from '../segmenter/split-sequence';
import type { NormalizedPathTrieOptions, RouteKey } from '../types';

export interface ResolvedRoute<V> {
  value: V;
  parameters: Parameters;
  pattern: string;
  key: RouteKey;
}

/**
 * Immutable trie produced by `PathTrieBuilder.build()`. Safe to share and
 * resolve from any number of callers.
 */
export class PathTrie<V> {
  private readonly layout: ImmutableTrieLayout<V>;
  private readonly matcher: TrieMatcher<V>;
  private readonly config: Readonly<NormalizedPathTrieOptions>;

  constructor(layout: ImmutableTrieLayout<V>, options: NormalizedPathTrieOptions) {
    this.layout = layout;
    this.matcher = new TrieMatcher(layout);
    this.config = Object.freeze({ ...options });
  }

  get size(): number {
    return this.layout.routes.length;
  }

  get options(): Readonly<NormalizedPathTrieOptions> {
    return this.config;
  }

  /**
   * Finds the best route for `path`, or null when nothing matches. Never
   * throws.
   */
  resolve(path: string): ResolvedRoute<V> | null {
    const normalized = this.config.caseSensitive ? path : path.toLowerCase();
    const outcome = this.matcher.match(splitPath(normalized, this.config.separator));
    if (!outcome) {
      return null;
    }

    const route = this.layout.routes[outcome.route];
    if (!route) {
      return null;
    }

    return {
      value: route.value,
      parameters: new Parameters(outcome.captures, outcome.catchAll),
      pattern: route.pattern,
      key: route.key,
    };
  }

  routes(): RouteDescription<V>[] {
    return this.layout.routes.map(({ key, pattern, value }) => ({ key, pattern, value }));
  }
}
