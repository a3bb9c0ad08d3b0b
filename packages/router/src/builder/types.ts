import type { PatternComponent, RouteKey } from '../types';

export interface RouteRecord<V> {
  key: RouteKey;
  pattern: string;
  components: PatternComponent[];
  value: V;
}

export interface RouteDescription<V> {
  readonly key: RouteKey;
  readonly pattern: string;
  readonly value: V;
}

export type RouteEntry<V> = readonly [pattern: string, value: V];
