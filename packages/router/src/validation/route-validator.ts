import { randomUUID } from 'node:crypto';

import { NO_INDEX } from '../constants';
import { ComponentKind } from '../enums';
import { RouteBuildError } from '../errors/errors';
import type { ImmutableTrieLayout } from '../layout/immutable-trie-layout';
import { TrieMatcher } from '../matcher/matcher';
import type { PatternComponent } from '../types';

export type SampleValueFactory = () => string;

/**
 * A concrete segment accepted by `component`, dynamic parts filled by
 * `sample`.
 */
export function sampleSegment(component: PatternComponent, sample: SampleValueFactory = randomUUID): string {
  switch (component.kind) {
    case ComponentKind.Literal:
      return component.text;
    case ComponentKind.PartialCapture:
    case ComponentKind.PartialWildcard:
      return `${component.prefix}${sample()}${component.suffix}`;
    case ComponentKind.Parameter:
    case ComponentKind.Wildcard:
    case ComponentKind.CatchAll:
      return sample();
  }
}

/**
 * Edges on the longest path from the root. A sample with more segments than
 * this can only be taken by a catch-all.
 */
export function layoutHeight<V>(layout: ImmutableTrieLayout<V>): number {
  // pre-order layout: every child index is greater than its parent's
  const heights = new Array<number>(layout.nodes.length).fill(0);

  for (let index = layout.nodes.length - 1; index >= 0; index--) {
    const node = layout.nodes[index];
    if (!node) {
      continue;
    }
    const children = [
      ...node.literalChildren.values(),
      ...node.partials.map(partial => partial.target),
      ...node.parameters.map(parameter => parameter.target),
    ];
    if (node.wildcardChild !== NO_INDEX) {
      children.push(node.wildcardChild);
    }

    let height = 0;
    for (const child of children) {
      height = Math.max(height, (heights[child] ?? 0) + 1);
    }
    heights[index] = height;
  }

  return heights[layout.rootIndex] ?? 0;
}

/**
 * Resolves a sample path for every route and throws `RouteBuildError`
 * (`route-shadowed`) for the first route whose samples all land elsewhere.
 * Catch-alls are sampled longest tail first, so the reported winner is the
 * route that takes paths deeper than the rest of the trie.
 */
export function assertRoutesReachable<V>(
  layout: ImmutableTrieLayout<V>,
  separator: string,
  sample: SampleValueFactory = randomUUID,
): void {
  const matcher = new TrieMatcher(layout);
  const catchAllTails = [...new Set([layoutHeight(layout) + 1, 1, 2, 0])];

  for (const route of layout.routes) {
    const head = route.components.filter(component => component.kind !== ComponentKind.CatchAll);
    const tails = head.length === route.components.length ? [0] : catchAllTails;

    let reachable = false;
    let longestMiss: { path: string; route: number } | undefined;
    for (const tail of tails) {
      const segments = head.map(component => sampleSegment(component, sample));
      for (let i = 0; i < tail; i++) {
        segments.push(sample());
      }

      const outcome = matcher.match(segments);
      if (outcome?.route === route.key) {
        reachable = true;
        break;
      }
      longestMiss ??= { path: separator + segments.join(separator), route: outcome ? outcome.route : NO_INDEX };
    }

    if (reachable || !longestMiss) {
      continue;
    }

    const path = longestMiss.path;
    const other = layout.routes[longestMiss.route];
    throw new RouteBuildError(
      'route-shadowed',
      route.pattern,
      other
        ? `Route '${route.pattern}' is shadowed by '${other.pattern}' (sample path '${path}')`
        : `Route '${route.pattern}' is unreachable (sample path '${path}')`,
    );
  }
}
