/**
 * The full word graph: one independent subgraph per word length.
 *
 * Words of different lengths are never neighbors, so every real graph
 * algorithm runs inside a single subgraph and this class only routes.
 */

import { SnapshotError } from '../core/errors.js';
import type { GraphSnapshot, LadderResult } from '../core/types.js';
import { SameLengthSubgraph } from './subgraph.js';

export class WordGraph {
  private readonly subgraphs = new Map<number, SameLengthSubgraph>();

  /**
   * Add a word to the subgraph of its length, creating that subgraph on
   * first use.
   */
  addWord(word: string): void {
    let subgraph = this.subgraphs.get(word.length);
    if (!subgraph) {
      subgraph = new SameLengthSubgraph(word.length);
      this.subgraphs.set(word.length, subgraph);
    }
    subgraph.addWord(word);
  }

  /**
   * Label every subgraph's components.
   *
   * @returns the number of forests found across all lengths
   */
  exploreForests(): number {
    let forests = 0;
    for (const subgraph of this.subgraphs.values()) {
      forests += subgraph.exploreAllComponents();
    }
    return forests;
  }

  has(word: string): boolean {
    return this.subgraphs.get(word.length)?.has(word) ?? false;
  }

  areConnected(from: string, to: string): boolean {
    if (from.length !== to.length) return false;
    return this.subgraphs.get(from.length)?.areConnected(from, to) ?? false;
  }

  shortestPath(from: string, to: string): string[] | null {
    if (from.length !== to.length) return null;
    return this.subgraphs.get(from.length)?.shortestPath(from, to) ?? null;
  }

  findLadder(from: string, to: string): LadderResult {
    if (from.length !== to.length) {
      return { found: false, reason: 'length-mismatch' };
    }
    const subgraph = this.subgraphs.get(from.length);
    if (!subgraph) {
      return { found: false, reason: 'unknown-word', word: from };
    }
    return subgraph.findLadder(from, to);
  }

  subgraph(length: number): SameLengthSubgraph | undefined {
    return this.subgraphs.get(length);
  }

  /**
   * Word lengths present in the graph, ascending.
   */
  lengths(): number[] {
    return [...this.subgraphs.keys()].sort((a, b) => a - b);
  }

  get totalWords(): number {
    let total = 0;
    for (const subgraph of this.subgraphs.values()) {
      total += subgraph.totalWords;
    }
    return total;
  }

  get totalForests(): number {
    let total = 0;
    for (const subgraph of this.subgraphs.values()) {
      total += subgraph.totalForests;
    }
    return total;
  }

  get distinctLengths(): number {
    return this.subgraphs.size;
  }

  toSnapshot(): GraphSnapshot {
    return {
      version: 1,
      subgraphs: [...this.subgraphs.values()]
        .sort((a, b) => a.length - b.length)
        .map((subgraph) => subgraph.toSnapshot()),
    };
  }

  static fromSnapshot(snapshot: GraphSnapshot): WordGraph {
    const graph = new WordGraph();
    for (const entry of snapshot.subgraphs) {
      if (graph.subgraphs.has(entry.length)) {
        throw new SnapshotError(`Duplicate subgraph for length ${entry.length}`);
      }
      graph.subgraphs.set(entry.length, SameLengthSubgraph.fromSnapshot(entry));
    }
    return graph;
  }
}
