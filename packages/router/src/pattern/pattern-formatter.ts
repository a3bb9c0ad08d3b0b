import { CATCH_ALL_TOKEN, DEFAULT_SEPARATOR, PARAMETER_SIGIL, WILDCARD_TOKEN } from '../constants';
import { ComponentKind } from '../enums';
import type { PatternComponent } from '../types';

export function formatComponent(component: PatternComponent): string {
  switch (component.kind) {
    case ComponentKind.Literal:
      return component.text;
    case ComponentKind.Parameter:
      return `${PARAMETER_SIGIL}${component.name}`;
    case ComponentKind.Wildcard:
      return WILDCARD_TOKEN;
    case ComponentKind.PartialCapture:
      return `${component.prefix}{${component.name}}${component.suffix}`;
    case ComponentKind.PartialWildcard:
      return `${component.prefix}${WILDCARD_TOKEN}${component.suffix}`;
    case ComponentKind.CatchAll:
      return CATCH_ALL_TOKEN;
  }
}

/**
 * Canonical text of a parsed pattern, e.g. `/users/:id/{file}.jpg/**`.
 * The empty pattern renders as the bare separator.
 */
export function formatPattern(components: readonly PatternComponent[], separator: string = DEFAULT_SEPARATOR): string {
  return separator + components.map(formatComponent).join(separator);
}
