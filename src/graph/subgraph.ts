/**
 * A forest of words that all share one length.
 *
 * Adjacency is discovered lazily: the component labeler computes each node's
 * neighbors the moment it labels the node, by comparing it against every
 * other word of the subgraph.
 */

import { SnapshotError, WordLengthMismatchError } from '../core/errors.js';
import { Queue } from '../core/queue.js';
import { areNeighbors } from '../core/words.js';
import {
  UNLABELED,
  type LadderResult,
  type SubgraphSnapshot,
  type WordNode,
} from '../core/types.js';

/**
 * A search-tree entry for the shortest-path BFS.
 */
interface PathStep {
  node: WordNode;
  parent: PathStep | null;
}

export class SameLengthSubgraph {
  private readonly nodes = new Map<string, WordNode>();
  private nextLabel = 1;

  constructor(readonly length: number) {}

  get totalWords(): number {
    return this.nodes.size;
  }

  get totalForests(): number {
    return this.nextLabel - 1;
  }

  has(word: string): boolean {
    return this.nodes.has(word);
  }

  getNode(word: string): WordNode | undefined {
    return this.nodes.get(word);
  }

  words(): IterableIterator<string> {
    return this.nodes.keys();
  }

  /**
   * Neighbors of a labeled word; empty for unknown or unlabeled words.
   */
  neighborsOf(word: string): readonly string[] {
    return this.nodes.get(word)?.neighbors ?? [];
  }

  /**
   * Insert a fresh, unlabeled node. Re-adding a word resets it.
   */
  addWord(word: string): void {
    if (word.length !== this.length) {
      throw new WordLengthMismatchError(word, this.length);
    }
    this.nodes.set(word, { word, label: UNLABELED, neighbors: [] });
  }

  /**
   * Every other word of the subgraph at distance exactly one from `node`.
   */
  computeNeighbors(node: WordNode): string[] {
    const neighbors: string[] = [];
    for (const other of this.nodes.values()) {
      if (areNeighbors(node.word, other.word)) {
        neighbors.push(other.word);
      }
    }
    return neighbors;
  }

  /**
   * Label every node reachable from `seed` with the current label, computing
   * adjacency on the way.
   *
   * A node may be enqueued by several neighbors before it is dequeued; the
   * label check at dequeue time skips the repeats.
   *
   * @returns how many nodes this call labeled
   */
  exploreComponent(seed: WordNode): number {
    let labeled = 0;
    const queue = Queue.from([seed]);

    for (let node = queue.dequeue(); node; node = queue.dequeue()) {
      if (node.label !== UNLABELED) continue;

      node.label = this.nextLabel;
      node.neighbors = Object.freeze(this.computeNeighbors(node));
      labeled++;

      for (const word of node.neighbors) {
        const neighbor = this.nodes.get(word);
        if (neighbor) queue.enqueue(neighbor);
      }
    }

    return labeled;
  }

  /**
   * Label every remaining unlabeled node, one fresh label per component.
   *
   * @returns how many components were discovered
   */
  exploreAllComponents(): number {
    let components = 0;
    for (const node of this.nodes.values()) {
      if (node.label !== UNLABELED) continue;
      this.exploreComponent(node);
      this.nextLabel++;
      components++;
    }
    return components;
  }

  areConnected(from: string, to: string): boolean {
    const a = this.nodes.get(from);
    const b = this.nodes.get(to);
    if (!a || !b) return false;
    return a.label !== UNLABELED && a.label === b.label;
  }

  /**
   * A shortest ladder from `from` to `to`, or null when none exists.
   */
  shortestPath(from: string, to: string): string[] | null {
    const result = this.findLadder(from, to);
    return result.found ? result.path : null;
  }

  /**
   * Search for a shortest ladder and report why none exists when it fails.
   *
   * The BFS starts at `to` and stops at `from`, so following parent links
   * from the match yields the ladder already ordered `from ... to`.
   */
  findLadder(from: string, to: string): LadderResult {
    for (const word of [from, to]) {
      if (!this.nodes.has(word)) {
        return { found: false, reason: 'unknown-word', word };
      }
    }
    if (!this.areConnected(from, to)) {
      return { found: false, reason: 'disconnected' };
    }

    const root = this.nodes.get(to);
    if (!root) return { found: false, reason: 'unknown-word', word: to };

    // Marked on enqueue, unlike the labeler which checks on dequeue
    const visited = new Set<string>([to]);
    const queue = Queue.from<PathStep>([{ node: root, parent: null }]);

    for (let step = queue.dequeue(); step; step = queue.dequeue()) {
      if (step.node.word === from) {
        const path: string[] = [];
        for (let cur: PathStep | null = step; cur; cur = cur.parent) {
          path.push(cur.node.word);
        }
        return { found: true, path };
      }

      for (const word of step.node.neighbors) {
        if (visited.has(word)) continue;
        visited.add(word);

        const neighbor = this.nodes.get(word);
        if (neighbor) queue.enqueue({ node: neighbor, parent: step });
      }
    }

    return { found: false, reason: 'unreachable' };
  }

  /**
   * Number of words in each forest, keyed by label.
   */
  componentSizes(): Map<number, number> {
    const sizes = new Map<number, number>();
    for (const node of this.nodes.values()) {
      if (node.label === UNLABELED) continue;
      sizes.set(node.label, (sizes.get(node.label) ?? 0) + 1);
    }
    return sizes;
  }

  /**
   * Size of the biggest forest, or 0 for an empty subgraph.
   */
  largestForest(): number {
    let largest = 0;
    for (const size of this.componentSizes().values()) {
      if (size > largest) largest = size;
    }
    return largest;
  }

  toSnapshot(): SubgraphSnapshot {
    return {
      length: this.length,
      nextLabel: this.nextLabel,
      nodes: Array.from(this.nodes.values(), (node) => ({
        word: node.word,
        label: node.label,
        neighbors: [...node.neighbors],
      })),
    };
  }

  /**
   * Restore a fully labeled subgraph, checking the invariants a fresh build
   * guarantees.
   */
  static fromSnapshot(snapshot: SubgraphSnapshot): SameLengthSubgraph {
    const subgraph = new SameLengthSubgraph(snapshot.length);
    const labels = new Set<number>();

    for (const entry of snapshot.nodes) {
      if (subgraph.nodes.has(entry.word)) {
        throw new SnapshotError(`Duplicate entry for "${entry.word}"`);
      }
      if (entry.word.length !== snapshot.length) {
        throw new SnapshotError(
          `"${entry.word}" does not belong to the length-${snapshot.length} subgraph`
        );
      }
      if (!Number.isInteger(entry.label) || entry.label < 1 || entry.label >= snapshot.nextLabel) {
        throw new SnapshotError(`"${entry.word}" has invalid label ${entry.label}`);
      }
      subgraph.nodes.set(entry.word, {
        word: entry.word,
        label: entry.label,
        neighbors: Object.freeze([...entry.neighbors]),
      });
      labels.add(entry.label);
    }

    // Fresh builds hand out labels 1..nextLabel-1 with none skipped
    if (labels.size !== snapshot.nextLabel - 1) {
      throw new SnapshotError(
        `nextLabel ${snapshot.nextLabel} does not match ${labels.size} labeled forests`
      );
    }

    for (const node of subgraph.nodes.values()) {
      for (const word of node.neighbors) {
        const neighbor = subgraph.nodes.get(word);
        if (!neighbor || !areNeighbors(node.word, word)) {
          throw new SnapshotError(`"${node.word}" lists invalid neighbor "${word}"`);
        }
        if (neighbor.label !== node.label) {
          throw new SnapshotError(
            `"${node.word}" and its neighbor "${word}" carry different labels`
          );
        }
        if (!neighbor.neighbors.includes(node.word)) {
          throw new SnapshotError(`"${word}" does not list its neighbor "${node.word}"`);
        }
      }
    }

    subgraph.nextLabel = snapshot.nextLabel;
    return subgraph;
  }
}
