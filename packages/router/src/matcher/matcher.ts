import { NO_INDEX } from '../constants';
import type { ImmutableTrieLayout, SerializedNodeRecord, SerializedPartial } from '../layout/immutable-trie-layout';

import { FrameStage, type MatchFrame } from './match-frame';

export type Capture = readonly [name: string, value: string];

export interface MatchOutcome {
  route: number;
  captures: Capture[];
  // null when no catch-all took part in the match
  catchAll: string[] | null;
}

/**
 * Depth-first walk over an {@link ImmutableTrieLayout}. At every node the
 * alternatives are tried in a fixed order (literal, partials, parameters,
 * wildcard, catch-all) and a failed subtree falls back to the next one.
 *
 * Holds no per-call state, so one instance can serve concurrent callers.
 */
export class TrieMatcher<V> {
  private readonly nodes: ReadonlyArray<SerializedNodeRecord>;
  private readonly rootIndex: number;

  constructor(layout: ImmutableTrieLayout<V>) {
    this.nodes = layout.nodes;
    this.rootIndex = layout.rootIndex;
  }

  match(segments: readonly string[]): MatchOutcome | null {
    const stack: MatchFrame[] = [this.frame(this.rootIndex, 0, 0)];
    const captures: Capture[] = [];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) {
        break;
      }
      const node = this.nodes[frame.nodeIndex];
      if (node === undefined) {
        stack.pop();
        continue;
      }

      // discard bindings made by an abandoned subtree
      captures.length = frame.paramBase;
      const segment = segments[frame.segmentIndex];

      switch (frame.stage) {
        case FrameStage.Enter: {
          if (segment === undefined) {
            if (node.route !== NO_INDEX) {
              return { route: node.route, captures, catchAll: null };
            }
            if (node.catchAllRoute !== NO_INDEX) {
              return { route: node.catchAllRoute, captures, catchAll: [] };
            }
            stack.pop();
            continue;
          }
          frame.stage = FrameStage.Literal;
          continue;
        }

        case FrameStage.Literal: {
          frame.stage = FrameStage.Partials;
          const target = segment === undefined ? undefined : node.literalChildren.get(segment);
          if (target !== undefined) {
            stack.push(this.frame(target, frame.segmentIndex + 1, captures.length));
          }
          continue;
        }

        case FrameStage.Partials: {
          const partial = segment === undefined ? undefined : this.nextPartial(node, frame, segment);
          if (partial === undefined || segment === undefined) {
            frame.stage = FrameStage.Parameter;
            frame.cursor = 0;
            continue;
          }
          if (partial.name !== null) {
            captures.push([partial.name, segment.slice(partial.prefix.length, segment.length - partial.suffix.length)]);
          }
          stack.push(this.frame(partial.target, frame.segmentIndex + 1, captures.length));
          continue;
        }

        case FrameStage.Parameter: {
          const parameter = node.parameters[frame.cursor];
          if (parameter === undefined || segment === undefined) {
            frame.stage = FrameStage.Wildcard;
            continue;
          }
          frame.cursor++;
          captures.push([parameter.name, segment]);
          stack.push(this.frame(parameter.target, frame.segmentIndex + 1, captures.length));
          continue;
        }

        case FrameStage.Wildcard: {
          frame.stage = FrameStage.CatchAll;
          if (node.wildcardChild !== NO_INDEX) {
            stack.push(this.frame(node.wildcardChild, frame.segmentIndex + 1, captures.length));
          }
          continue;
        }

        case FrameStage.CatchAll: {
          frame.stage = FrameStage.Exit;
          if (node.catchAllRoute !== NO_INDEX) {
            return { route: node.catchAllRoute, captures, catchAll: segments.slice(frame.segmentIndex) };
          }
          continue;
        }

        case FrameStage.Exit: {
          stack.pop();
          continue;
        }
      }
    }

    return null;
  }

  private nextPartial(node: SerializedNodeRecord, frame: MatchFrame, segment: string): SerializedPartial | undefined {
    while (frame.cursor < node.partials.length) {
      const partial = node.partials[frame.cursor];
      frame.cursor++;
      if (partial !== undefined && fitsPartial(partial, segment)) {
        return partial;
      }
    }
    return undefined;
  }

  private frame(nodeIndex: number, segmentIndex: number, paramBase: number): MatchFrame {
    return { nodeIndex, segmentIndex, stage: FrameStage.Enter, paramBase, cursor: 0 };
  }
}

/**
 * A partial fits when the segment carries its prefix and suffix without
 * overlap and leaves at least one character between them.
 */
export function fitsPartial(partial: Pick<SerializedPartial, 'prefix' | 'suffix'>, segment: string): boolean {
  return (
    segment.length > partial.prefix.length + partial.suffix.length &&
    segment.startsWith(partial.prefix) &&
    segment.endsWith(partial.suffix)
  );
}
