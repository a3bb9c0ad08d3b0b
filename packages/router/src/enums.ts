export enum ComponentKind {
  Literal = 'literal',
  Parameter = 'parameter',
  Wildcard = 'wildcard',
  PartialCapture = 'partial-capture',
  PartialWildcard = 'partial-wildcard',
  CatchAll = 'catch-all',
}
