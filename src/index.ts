/**
 * wordforest - one-letter-change forests and word ladders over a dictionary
 *
 * @packageDocumentation
 */

export type {
  WordNode,
  GraphSnapshot,
  SubgraphSnapshot,
  WordNodeSnapshot,
  LadderResult,
  NoLadderReason,
  WordFilterOptions,
} from './core/types.js';
export {
  WordSourceError,
  GraphStoreError,
  SnapshotError,
  WordLengthMismatchError,
  InvalidFilterOptionsError,
} from './core/errors.js';
export { isValidWord, createWordFilter, hammingDistance, areNeighbors } from './core/words.js';
export { SameLengthSubgraph } from './graph/subgraph.js';
export { WordGraph } from './graph/word-graph.js';
export { buildGraph, loadOrBuild } from './graph/build.js';
export type { BuildOptions, LoadOrBuildOptions, LoadedGraph, Log } from './graph/build.js';
export { FileGraphStore, parseSnapshot, type GraphStore } from './storage/store.js';
export { FileWordSource, ArrayWordSource, type WordSource } from './storage/words.js';
