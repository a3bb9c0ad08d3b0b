import { NO_INDEX } from '../constants';
import type { PartialComponent } from '../types';

export interface PartialEdge {
  component: PartialComponent;
  child: TrieNode;
}

export interface ParameterEdge {
  name: string;
  child: TrieNode;
}

export class TrieNode {
  // Literal segment -> child, O(1) lookup
  literalChildren: Map<string, TrieNode> = new Map();
  // Tried in registration order
  partials: PartialEdge[] = [];
  // One edge per distinct name, tried in registration order
  parameters: ParameterEdge[] = [];
  wildcardChild?: TrieNode;

  // Route indexes into the builder's route table
  route: number = NO_INDEX;
  catchAllRoute: number = NO_INDEX;
}
