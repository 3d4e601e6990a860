import { InteractionModelError } from '../errors';

export type Transition = readonly [from: string, to: string];

export interface InteractionModelSpec {
  /** Labels with no edges may be listed here so they still resolve to a node */
  nodes?: readonly string[];
  edges: readonly Transition[];
}

const NO_SUCCESSORS: ReadonlySet<string> = new Set<string>();

/**
 * Directed graph of legal dialogue-act transitions: an edge A → B means act B
 * may follow act A. Built once and never mutated. Labels the graph does not
 * know have no edges, so any transition through them is illegal.
 */
export class InteractionModel {
  private readonly adjacency: ReadonlyMap<string, ReadonlySet<string>>;

  private constructor(adjacency: Map<string, Set<string>>) {
    this.adjacency = adjacency;
  }

  static fromSpec(spec: InteractionModelSpec): InteractionModel {
    const adjacency = new Map<string, Set<string>>();
    const node = (label: string): Set<string> => {
      if (label.trim() === '') {
        throw new InteractionModelError('Interaction model contains an empty act label');
      }
      let successors = adjacency.get(label);
      if (!successors) {
        successors = new Set<string>();
        adjacency.set(label, successors);
      }
      return successors;
    };

    for (const label of spec.nodes ?? []) node(label);
    for (const [from, to] of spec.edges) {
      node(to);
      node(from).add(to);
    }
    return new InteractionModel(adjacency);
  }

  /** Build from an adjacency list: `{ request: ['inform'], inform: ['recommend'] }` */
  static fromAdjacency(transitions: Readonly<Record<string, readonly string[]>>): InteractionModel {
    const edges: Transition[] = [];
    for (const [from, successors] of Object.entries(transitions)) {
      for (const to of successors) edges.push([from, to]);
    }
    return InteractionModel.fromSpec({ nodes: Object.keys(transitions), edges });
  }

  get labels(): string[] {
    return Array.from(this.adjacency.keys());
  }

  get edgeCount(): number {
    let count = 0;
    for (const successors of this.adjacency.values()) count += successors.size;
    return count;
  }

  hasNode(label: string): boolean {
    return this.adjacency.has(label);
  }

  /** Legal next acts after `label`; empty for unknown labels */
  successors(label: string): ReadonlySet<string> {
    return this.adjacency.get(label) ?? NO_SUCCESSORS;
  }

  isLegal(from: string, to: string): boolean {
    return this.successors(from).has(to);
  }

  /** True when at least one (from, to) pairing is an edge */
  anyLegal(fromLabels: readonly string[], toLabels: readonly string[]): boolean {
    return fromLabels.some((from) => toLabels.some((to) => this.isLegal(from, to)));
  }
}
