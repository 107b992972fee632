#!/usr/bin/env node
/**
 * wordforest CLI - connectivity and word-ladder queries over a dictionary.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadOrBuild, type LoadedGraph } from '../graph/build.js';
import { DEMO_PAIRS, formatLadder } from './format.js';
import { DEFAULT_SNAPSHOT_FILE, FileGraphStore } from '../storage/store.js';
import { DEFAULT_DICTIONARY, FileWordSource } from '../storage/words.js';

interface GlobalOptions {
  dictionary: string;
  cache: string;
  minLength?: number;
  maxLength?: number;
  rebuild?: boolean;
}

function parseLength(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('wordforest')
  .description('Partition a dictionary into one-letter-change forests and find word ladders')
  .version('0.1.0')
  .option('-d, --dictionary <path>', 'Word list, one word per line', DEFAULT_DICTIONARY)
  .option('-c, --cache <path>', 'Snapshot file (.json or .yaml)', DEFAULT_SNAPSHOT_FILE)
  .option('--min-length <n>', 'Shortest word length to admit', parseLength)
  .option('--max-length <n>', 'Longest word length to admit', parseLength)
  .option('--rebuild', 'Ignore any existing snapshot');

function openGraph(): LoadedGraph {
  const options = program.opts<GlobalOptions>();
  return loadOrBuild({
    store: new FileGraphStore(options.cache),
    source: new FileWordSource(options.dictionary),
    filter: { minLength: options.minLength, maxLength: options.maxLength },
    rebuild: options.rebuild,
    log: (message) => console.log(chalk.gray(message)),
  });
}

// Build command
program
  .command('build')
  .description('Load or build the forest graph and report its size')
  .action(() => {
    const { graph, origin } = openGraph();
    for (const length of graph.lengths()) {
      const subgraph = graph.subgraph(length);
      if (!subgraph) continue;
      console.log(`There are ${subgraph.totalWords} words of size ${length}.`);
    }
    console.log(
      chalk.green(
        `${origin === 'built' ? 'Built' : 'Restored'} ${graph.totalWords} words in ${graph.totalForests} forests.`
      )
    );
  });

// Connected command
program
  .command('connected <from> <to>')
  .description('Check whether two words are linked by one-letter changes')
  .option('--check', 'Exit with non-zero status if not connected')
  .action((from: string, to: string, options: { check?: boolean }) => {
    const { graph } = openGraph();
    const connected = graph.areConnected(from, to);
    const verdict = connected ? chalk.green('true') : chalk.yellow('false');
    console.log(`${chalk.cyan(from)} -> ${chalk.cyan(to)}: ${verdict}`);
    if (!connected && options.check) {
      process.exit(1);
    }
  });

// Path command
program
  .command('path <from> <to>')
  .description('Print a shortest word ladder between two words')
  .option('--check', 'Exit with non-zero status if no ladder exists')
  .action((from: string, to: string, options: { check?: boolean }) => {
    const { graph } = openGraph();
    const result = graph.findLadder(from, to);
    console.log(formatLadder(from, to, result));
    if (!result.found && options.check) {
      process.exit(1);
    }
  });

// Demo command
program
  .command('demo')
  .description('Run the sample word pairs in both directions')
  .action(() => {
    const { graph } = openGraph();

    for (const [a, b] of DEMO_PAIRS) {
      console.log(`${a} -> ${b}: ${graph.areConnected(a, b)}`);
      console.log(`${b} -> ${a}: ${graph.areConnected(b, a)}`);
    }

    console.log();

    for (const [a, b] of DEMO_PAIRS) {
      console.log(`${a} -> ${b}: ${formatLadder(a, b, graph.findLadder(a, b))}`);
      console.log(`${b} -> ${a}: ${formatLadder(b, a, graph.findLadder(b, a))}`);
    }
  });

// Stats command
program
  .command('stats')
  .description('Show words and forests per word length')
  .action(() => {
    const { graph } = openGraph();

    console.log(chalk.bold('length  words  forests  largest'));
    for (const length of graph.lengths()) {
      const subgraph = graph.subgraph(length);
      if (!subgraph) continue;
      const largest = subgraph.largestForest();
      console.log(
        `${String(length).padStart(6)}  ${String(subgraph.totalWords).padStart(5)}  ${String(subgraph.totalForests).padStart(7)}  ${String(largest).padStart(7)}`
      );
    }
    console.log(
      chalk.gray(
        `${graph.totalWords} words, ${graph.totalForests} forests, ${graph.distinctLengths} lengths`
      )
    );
  });

try {
  program.parse();
} catch (err) {
  console.error(chalk.red(err instanceof Error ? `${err.name}: ${err.message}` : String(err)));
  process.exit(1);
}
