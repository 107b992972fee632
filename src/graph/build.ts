/**
 * Graph construction and the load-or-build lifecycle.
 */

import type { WordFilterOptions } from '../core/types.js';
import { createWordFilter } from '../core/words.js';
import type { GraphStore } from '../storage/store.js';
import type { WordSource } from '../storage/words.js';
import { WordGraph } from './word-graph.js';

/**
 * Progress callback; library code never prints on its own.
 */
export type Log = (message: string) => void;

export interface BuildOptions {
  filter?: WordFilterOptions;
  log?: Log;
}

export interface LoadOrBuildOptions extends BuildOptions {
  store: GraphStore;
  source: WordSource;
  /** Ignore any stored snapshot and build from the word source. */
  rebuild?: boolean;
}

export interface LoadedGraph {
  graph: WordGraph;
  origin: 'restored' | 'built';
}

/**
 * Filter the candidate words, bucket them by length and label every forest.
 */
export function buildGraph(words: Iterable<string>, options: BuildOptions = {}): WordGraph {
  const log = options.log ?? (() => {});
  const accept = createWordFilter(options.filter);
  const graph = new WordGraph();

  for (const word of words) {
    if (accept(word)) graph.addWord(word);
  }

  log(
    `Assigning forests and analyzing neighbors. There are ${graph.distinctLengths} distinct word lengths.`
  );
  graph.exploreForests();
  log(`Assigned ${graph.totalWords} words into ${graph.totalForests} forests.`);

  return graph;
}

/**
 * Restore the graph from the store, or build it from the word source and
 * save it once.
 */
export function loadOrBuild(options: LoadOrBuildOptions): LoadedGraph {
  const { store, source, rebuild = false } = options;
  const log = options.log ?? (() => {});

  if (!rebuild) {
    const restored = store.tryLoad();
    if (restored) {
      log(
        `Loaded pre-processed forest graph. ${restored.distinctLengths} distinct word lengths in graph.`
      );
      return { graph: restored, origin: 'restored' };
    }
  }

  log(`Loading words from ${source.description}.`);
  const graph = buildGraph(source.readWords(), options);
  store.save(graph);
  log('Saved forest graph.');

  return { graph, origin: 'built' };
}
