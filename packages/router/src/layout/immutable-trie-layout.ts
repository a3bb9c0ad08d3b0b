import type { ComponentKind } from '../enums';
import type { PatternComponent, RouteKey } from '../types';

export interface SerializedPartial {
  readonly kind: ComponentKind.PartialCapture | ComponentKind.PartialWildcard;
  readonly prefix: string;
  readonly suffix: string;
  // null for partial wildcards
  readonly name: string | null;
  readonly target: number;
}

export interface SerializedParameter {
  readonly name: string;
  readonly target: number;
}

export interface SerializedNodeRecord {
  readonly literalChildren: ReadonlyMap<string, number>;
  readonly partials: ReadonlyArray<SerializedPartial>;
  readonly parameters: ReadonlyArray<SerializedParameter>;
  readonly wildcardChild: number;
  readonly route: number;
  readonly catchAllRoute: number;
}

export interface CompiledRoute<V> {
  readonly key: RouteKey;
  readonly pattern: string;
  readonly components: ReadonlyArray<PatternComponent>;
  readonly value: V;
}

/**
 * Index-addressed, frozen form of the trie. Node and route references are
 * array indexes; `NO_INDEX` marks an absent slot.
 */
export interface ImmutableTrieLayout<V> {
  readonly rootIndex: number;
  readonly nodes: ReadonlyArray<SerializedNodeRecord>;
  readonly routes: ReadonlyArray<CompiledRoute<V>>;
}
