/**
 * Core type definitions for word nodes, snapshots and query results.
 */

/**
 * Label of a node the component labeler has not visited yet.
 */
export const UNLABELED = 0;

/**
 * A word in a same-length subgraph.
 *
 * `label` is 0 until the labeler reaches the node; `neighbors` is empty until
 * then and frozen afterwards.
 */
export interface WordNode {
  readonly word: string;
  label: number;
  neighbors: readonly string[];
}

/**
 * Serialized form of a single node.
 */
export interface WordNodeSnapshot {
  word: string;
  label: number;
  neighbors: string[];
}

/**
 * Serialized form of one length class.
 */
export interface SubgraphSnapshot {
  length: number;
  nextLabel: number;
  nodes: WordNodeSnapshot[];
}

/**
 * Serialized form of the whole partitioned graph.
 */
export interface GraphSnapshot {
  version: 1;
  subgraphs: SubgraphSnapshot[];
}

/**
 * Why a ladder query came back empty.
 */
export type NoLadderReason =
  | 'length-mismatch' // words of different lengths can never be linked
  | 'unknown-word' // a word is not in the dictionary
  | 'disconnected' // both words exist but live in different forests
  | 'unreachable'; // same forest, yet the search found no path

/**
 * Outcome of a ladder query.
 */
export type LadderResult =
  | { found: true; path: string[] }
  | { found: false; reason: NoLadderReason; word?: string };

/**
 * Inclusive length bounds for the word filter.
 */
export interface WordFilterOptions {
  minLength?: number;
  maxLength?: number;
}
