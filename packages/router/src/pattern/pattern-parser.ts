import {
  CAPTURE_CLOSE,
  CAPTURE_OPEN,
  CATCH_ALL_TOKEN,
  DEFAULT_SEPARATOR,
  PARAMETER_SIGIL,
  WILDCARD_TOKEN,
} from '../constants';
import { ComponentKind } from '../enums';
import { RouteBuildError } from '../errors/errors';
import { splitPath } from '../segmenter/split-sequence';
import type { PatternComponent } from '../types';

export interface PatternParseOptions {
  separator?: string;
  caseSensitive?: boolean;
}

interface CaptureGroup {
  prefix: string;
  name: string;
  suffix: string;
}

/**
 * Splits `pattern` with the path segmenter and classifies every segment.
 * Throws {@link RouteBuildError} for malformed segments.
 */
export function parsePattern(pattern: string, options: PatternParseOptions = {}): PatternComponent[] {
  const separator = options.separator ?? DEFAULT_SEPARATOR;
  const foldCase = options.caseSensitive === false;
  const segments = splitPath(pattern, separator);
  const components: PatternComponent[] = [];

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment === undefined) {
      continue;
    }

    const component = parseSegment(segment, pattern, foldCase);
    if (component.kind === ComponentKind.CatchAll && i !== segments.length - 1) {
      throw new RouteBuildError(
        'catch-all-not-terminal',
        pattern,
        `Catch-all '${CATCH_ALL_TOKEN}' must be the last segment of '${pattern}'`,
      );
    }
    components.push(component);
  }

  return components;
}

export function parseSegment(segment: string, pattern: string, foldCase = false): PatternComponent {
  const fold = (text: string): string => (foldCase ? text.toLowerCase() : text);

  if (segment.startsWith(PARAMETER_SIGIL)) {
    const name = segment.slice(PARAMETER_SIGIL.length);
    if (name.length === 0) {
      throw new RouteBuildError('empty-parameter-name', pattern, `Parameter name is empty in '${pattern}'`);
    }
    return { kind: ComponentKind.Parameter, name };
  }

  if (segment === CATCH_ALL_TOKEN) {
    return { kind: ComponentKind.CatchAll };
  }

  if (segment === WILDCARD_TOKEN) {
    return { kind: ComponentKind.Wildcard };
  }

  const group = findCaptureGroup(segment);
  if (group) {
    if (isAmbiguous(group.prefix) || isAmbiguous(group.suffix)) {
      throw ambiguous(segment, pattern);
    }
    if (group.prefix.length === 0 && group.suffix.length === 0) {
      return group.name.length === 0
        ? { kind: ComponentKind.Wildcard }
        : { kind: ComponentKind.Parameter, name: group.name };
    }
    if (group.name.length === 0) {
      return { kind: ComponentKind.PartialWildcard, prefix: fold(group.prefix), suffix: fold(group.suffix) };
    }
    return {
      kind: ComponentKind.PartialCapture,
      prefix: fold(group.prefix),
      name: group.name,
      suffix: fold(group.suffix),
    };
  }

  const star = segment.indexOf(WILDCARD_TOKEN);
  if (star !== -1) {
    if (segment.indexOf(WILDCARD_TOKEN, star + 1) !== -1) {
      throw ambiguous(segment, pattern);
    }
    return {
      kind: ComponentKind.PartialWildcard,
      prefix: fold(segment.slice(0, star)),
      suffix: fold(segment.slice(star + 1)),
    };
  }

  return { kind: ComponentKind.Literal, text: fold(segment) };
}

function findCaptureGroup(segment: string): CaptureGroup | undefined {
  const open = segment.indexOf(CAPTURE_OPEN);
  if (open === -1) {
    return undefined;
  }
  const close = segment.indexOf(CAPTURE_CLOSE, open + 1);
  if (close === -1) {
    return undefined;
  }

  return {
    prefix: segment.slice(0, open),
    name: segment.slice(open + 1, close),
    suffix: segment.slice(close + 1),
  };
}

function isAmbiguous(text: string): boolean {
  return text.includes(WILDCARD_TOKEN) || findCaptureGroup(text) !== undefined;
}

function ambiguous(segment: string, pattern: string): RouteBuildError {
  return new RouteBuildError(
    'ambiguous-partial',
    pattern,
    `Segment '${segment}' in '${pattern}' has more than one capture or wildcard`,
  );
}
