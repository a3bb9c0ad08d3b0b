import type { Logger } from '@waymark/logger';

import { NO_INDEX } from '../constants';
import { ComponentKind } from '../enums';
import { BuilderFinalizedError, RouteBuildError } from '../errors/errors';
import { compileLayout } from '../layout/layout-compiler';
import { normalizeTrieOptions } from '../options/trie-options';
import { formatPattern } from '../pattern/pattern-formatter';
import { parsePattern } from '../pattern/pattern-parser';
import { PathTrie } from '../trie/path-trie';
import type {
  NormalizedPathTrieOptions,
  PartialComponent,
  PathTrieOptions,
  PatternComponent,
  RouteKey,
} from '../types';
import { assertRoutesReachable } from '../validation/route-validator';

import { TrieNode } from './trie-node';
import type { RouteDescription, RouteEntry, RouteRecord } from './types';

/**
 * Mutable accumulation phase of a {@link PathTrie}. Routes are added, then
 * `build()` compiles the immutable trie and seals the builder.
 */
export class PathTrieBuilder<V> {
  private root: TrieNode | null = new TrieNode();
  private readonly records: RouteRecord<V>[] = [];
  private readonly options: NormalizedPathTrieOptions;
  private readonly logger: Logger;

  constructor(options?: PathTrieOptions) {
    this.options = normalizeTrieOptions(options);
    this.logger = this.options.logger;
  }

  addEntry(pattern: string, value: V): RouteKey {
    const root = this.assertActive();
    const components = parsePattern(pattern, this.options);
    const canonical = formatPattern(components, this.options.separator);
    this.checkParameterNames(pattern, components);

    const existing = this.probe(root, pattern, components);
    if (existing !== undefined) {
      existing.value = value;
      this.logger.warn('Route overwritten', { pattern: canonical, key: existing.key });
      return existing.key;
    }

    const key = this.records.length;
    this.records.push({ key, pattern: canonical, components, value });

    const last = components[components.length - 1];
    const node = this.insert(root, components);
    if (last?.kind === ComponentKind.CatchAll) {
      node.catchAllRoute = key;
    } else {
      node.route = key;
    }

    this.logger.debug('Route registered', { pattern: canonical, key });
    return key;
  }

  addEntries(entries: Iterable<RouteEntry<V>>): RouteKey[] {
    this.assertActive();
    const keys: RouteKey[] = [];
    for (const [pattern, value] of entries) {
      keys.push(this.addEntry(pattern, value));
    }
    return keys;
  }

  routes(): RouteDescription<V>[] {
    return this.records.map(({ key, pattern, value }) => ({ key, pattern, value }));
  }

  /**
   * Throws `RouteBuildError` (`route-shadowed`) when a registered route can
   * never win resolution because higher-priority routes take its paths.
   */
  validate(): void {
    const root = this.assertActive();
    assertRoutesReachable(compileLayout(root, this.records), this.options.separator);
  }

  build(): PathTrie<V> {
    const root = this.assertActive();
    const layout = compileLayout(root, this.records);
    this.root = null;

    this.logger.debug('Trie built', { routes: layout.routes.length, nodes: layout.nodes.length });
    return new PathTrie(layout, this.options);
  }

  private assertActive(): TrieNode {
    if (!this.root) {
      throw new BuilderFinalizedError();
    }
    return this.root;
  }

  private checkParameterNames(pattern: string, components: readonly PatternComponent[]): void {
    const seen = new Set<string>();
    for (const component of components) {
      if (component.kind !== ComponentKind.Parameter && component.kind !== ComponentKind.PartialCapture) {
        continue;
      }
      if (!seen.has(component.name)) {
        seen.add(component.name);
        continue;
      }

      switch (this.options.duplicateParamPolicy) {
        case 'error':
          throw new RouteBuildError(
            'duplicate-parameter',
            pattern,
            `Duplicate parameter name '${component.name}' in '${pattern}'`,
          );
        case 'warn':
          this.logger.warn('Duplicate parameter name, the deepest binding wins', { pattern, name: component.name });
          break;
        case 'silent':
          break;
      }
    }
  }

  /**
   * Walks the existing nodes for `components` without creating any, so a
   * rejected pattern leaves the trie untouched. Returns the record to
   * overwrite when an identical literal-only route exists.
   */
  private probe(root: TrieNode, pattern: string, components: readonly PatternComponent[]): RouteRecord<V> | undefined {
    let node: TrieNode | undefined = root;

    for (const component of components) {
      if (component.kind === ComponentKind.CatchAll) {
        if (node.catchAllRoute !== NO_INDEX) {
          throw duplicateRoute(pattern);
        }
        return undefined;
      }

      node = existingChild(node, component);
      if (!node) {
        return undefined;
      }
    }

    const record = this.records[node.route];
    if (!record) {
      return undefined;
    }
    if (components.some(component => component.kind !== ComponentKind.Literal)) {
      throw duplicateRoute(pattern);
    }
    return record;
  }

  private insert(root: TrieNode, components: readonly PatternComponent[]): TrieNode {
    let node = root;

    for (const component of components) {
      switch (component.kind) {
        case ComponentKind.Literal: {
          let child = node.literalChildren.get(component.text);
          if (!child) {
            child = new TrieNode();
            node.literalChildren.set(component.text, child);
          }
          node = child;
          break;
        }
        case ComponentKind.PartialCapture:
        case ComponentKind.PartialWildcard: {
          let edge = node.partials.find(candidate => samePartial(candidate.component, component));
          if (!edge) {
            edge = { component, child: new TrieNode() };
            node.partials.push(edge);
          }
          node = edge.child;
          break;
        }
        case ComponentKind.Parameter: {
          let edge = node.parameters.find(candidate => candidate.name === component.name);
          if (!edge) {
            edge = { name: component.name, child: new TrieNode() };
            node.parameters.push(edge);
          }
          node = edge.child;
          break;
        }
        case ComponentKind.Wildcard: {
          node.wildcardChild ??= new TrieNode();
          node = node.wildcardChild;
          break;
        }
        case ComponentKind.CatchAll:
          // terminal, the value lives on the current node
          return node;
      }
    }

    return node;
  }
}

function existingChild(node: TrieNode, component: PatternComponent): TrieNode | undefined {
  switch (component.kind) {
    case ComponentKind.Literal:
      return node.literalChildren.get(component.text);
    case ComponentKind.PartialCapture:
    case ComponentKind.PartialWildcard:
      return node.partials.find(candidate => samePartial(candidate.component, component))?.child;
    case ComponentKind.Parameter:
      return node.parameters.find(candidate => candidate.name === component.name)?.child;
    case ComponentKind.Wildcard:
      return node.wildcardChild;
    case ComponentKind.CatchAll:
      return undefined;
  }
}

function samePartial(a: PartialComponent, b: PartialComponent): boolean {
  if (a.kind !== b.kind || a.prefix !== b.prefix || a.suffix !== b.suffix) {
    return false;
  }
  if (a.kind === ComponentKind.PartialCapture && b.kind === ComponentKind.PartialCapture) {
    return a.name === b.name;
  }
  return true;
}

function duplicateRoute(pattern: string): RouteBuildError {
  return new RouteBuildError('duplicate-route', pattern, `Conflict: route '${pattern}' is already registered`);
}
