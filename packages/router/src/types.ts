import type { Logger } from '@waymark/logger';

import type { ComponentKind } from './enums';

export type RouteKey = number;

export type DuplicateParamPolicy = 'error' | 'warn' | 'silent';

export interface PathTrieOptions {
  /**
   * Single code point splitting paths and patterns into segments.
   * @default '/'
   */
  separator?: string;
  /**
   * When false, literal text is lower-cased at registration and paths are
   * lower-cased before resolving, so captured values come back lower-cased.
   * @default true
   */
  caseSensitive?: boolean;
  /**
   * What to do when one pattern binds the same name twice (`/:id/x/:id`).
   * The deepest binding wins when the route is allowed.
   * @default 'warn'
   */
  duplicateParamPolicy?: DuplicateParamPolicy;
  logger?: Logger;
}

export interface NormalizedPathTrieOptions {
  separator: string;
  caseSensitive: boolean;
  duplicateParamPolicy: DuplicateParamPolicy;
  logger: Logger;
}

export interface LiteralComponent {
  kind: ComponentKind.Literal;
  text: string;
}

export interface ParameterComponent {
  kind: ComponentKind.Parameter;
  name: string;
}

export interface WildcardComponent {
  kind: ComponentKind.Wildcard;
}

export interface PartialCaptureComponent {
  kind: ComponentKind.PartialCapture;
  prefix: string;
  name: string;
  suffix: string;
}

export interface PartialWildcardComponent {
  kind: ComponentKind.PartialWildcard;
  prefix: string;
  suffix: string;
}

export interface CatchAllComponent {
  kind: ComponentKind.CatchAll;
}

export type PartialComponent = PartialCaptureComponent | PartialWildcardComponent;

export type PatternComponent =
  | LiteralComponent
  | ParameterComponent
  | WildcardComponent
  | PartialCaptureComponent
  | PartialWildcardComponent
  | CatchAllComponent;

export interface SegmentRange {
  start: number;
  end: number;
}

export type RouteBuildErrorReason =
  | 'catch-all-not-terminal'
  | 'empty-parameter-name'
  | 'ambiguous-partial'
  | 'duplicate-route'
  | 'duplicate-parameter'
  | 'route-shadowed';

export type ParamParser<T> = (raw: string) => T | undefined;
