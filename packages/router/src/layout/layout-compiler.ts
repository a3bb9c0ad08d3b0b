import type { RouteRecord } from '../builder/types';
import type { TrieNode } from '../builder/trie-node';
import { NO_INDEX } from '../constants';
import { ComponentKind } from '../enums';

import type {
  CompiledRoute,
  ImmutableTrieLayout,
  SerializedNodeRecord,
  SerializedParameter,
  SerializedPartial,
} from './immutable-trie-layout';

type MutableRecord = {
  literalChildren: Map<string, number>;
  partials: SerializedPartial[];
  parameters: SerializedParameter[];
  wildcardChild: number;
  route: number;
  catchAllRoute: number;
};

/**
 * Linearizes the builder's node graph (pre-order, root at 0) and snapshots
 * the route table. The builder's nodes are not referenced afterwards.
 */
export function compileLayout<V>(root: TrieNode, routes: ReadonlyArray<RouteRecord<V>>): ImmutableTrieLayout<V> {
  const nodes: MutableRecord[] = [];

  const visit = (node: TrieNode): number => {
    const record: MutableRecord = {
      literalChildren: new Map(),
      partials: [],
      parameters: [],
      wildcardChild: NO_INDEX,
      route: node.route,
      catchAllRoute: node.catchAllRoute,
    };
    const nodeIndex = nodes.push(record) - 1;

    for (const [segment, child] of node.literalChildren) {
      record.literalChildren.set(segment, visit(child));
    }

    for (const { component, child } of node.partials) {
      const target = visit(child);
      record.partials.push(
        component.kind === ComponentKind.PartialCapture
          ? { kind: component.kind, prefix: component.prefix, suffix: component.suffix, name: component.name, target }
          : { kind: component.kind, prefix: component.prefix, suffix: component.suffix, name: null, target },
      );
    }

    for (const { name, child } of node.parameters) {
      record.parameters.push({ name, target: visit(child) });
    }

    if (node.wildcardChild) {
      record.wildcardChild = visit(node.wildcardChild);
    }

    return nodeIndex;
  };

  const rootIndex = visit(root);

  return Object.freeze({
    rootIndex,
    nodes: freezeRecords(nodes),
    routes: freezeRoutes(routes),
  });
}

function freezeRecords(records: MutableRecord[]): ReadonlyArray<SerializedNodeRecord> {
  return Object.freeze(
    records.map(record =>
      Object.freeze({
        ...record,
        literalChildren: new Map(record.literalChildren),
        partials: Object.freeze(record.partials.map(partial => Object.freeze({ ...partial }))),
        parameters: Object.freeze(record.parameters.map(parameter => Object.freeze({ ...parameter }))),
      }),
    ),
  );
}

function freezeRoutes<V>(routes: ReadonlyArray<RouteRecord<V>>): ReadonlyArray<CompiledRoute<V>> {
  return Object.freeze(
    routes.map(route =>
      Object.freeze({
        key: route.key,
        pattern: route.pattern,
        components: Object.freeze(route.components.map(component => Object.freeze({ ...component }))),
        value: route.value,
      }),
    ),
  );
}
