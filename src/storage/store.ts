/**
 * Snapshot persistence for a fully labeled word graph.
 *
 * The file holds the structural snapshot (lengths, words, labels and
 * adjacency lists) as JSON, or as YAML when the path ends in .yaml/.yml.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, extname } from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { GraphStoreError, SnapshotError } from '../core/errors.js';
import type { GraphSnapshot } from '../core/types.js';
import { WordGraph } from '../graph/word-graph.js';

/**
 * Default snapshot file, relative to the working directory.
 */
export const DEFAULT_SNAPSHOT_FILE = 'wordForest.json';

/**
 * Restores and persists a word graph.
 */
export interface GraphStore {
  /** The stored graph, or null when nothing has been saved yet. */
  tryLoad(): WordGraph | null;
  save(graph: WordGraph): void;
}

const wordNodeSchema = z.object({
  word: z.string().min(1),
  label: z.number().int(),
  neighbors: z.array(z.string()),
});

const subgraphSchema = z.object({
  length: z.number().int().positive(),
  nextLabel: z.number().int().positive(),
  nodes: z.array(wordNodeSchema),
});

const graphSnapshotSchema = z.object({
  version: z.literal(1),
  subgraphs: z.array(subgraphSchema),
});

export type SnapshotFormat = 'json' | 'yaml';

/**
 * Pick the encoding from the file extension.
 */
export function formatForPath(filePath: string): SnapshotFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

/**
 * Validate decoded data and rebuild the graph from it.
 */
export function parseSnapshot(data: unknown): WordGraph {
  const result = graphSnapshotSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') || '(root)' : '(root)';
    throw new SnapshotError(`Malformed snapshot at ${where}: ${issue?.message ?? 'invalid'}`);
  }
  const snapshot: GraphSnapshot = result.data;
  return WordGraph.fromSnapshot(snapshot);
}

export class FileGraphStore implements GraphStore {
  readonly format: SnapshotFormat;

  constructor(readonly path: string = DEFAULT_SNAPSHOT_FILE) {
    this.format = formatForPath(path);
  }

  tryLoad(): WordGraph | null {
    if (!existsSync(this.path)) return null;

    let content: string;
    try {
      content = readFileSync(this.path, 'utf-8');
    } catch (err) {
      throw new GraphStoreError(`Cannot read snapshot ${this.path}`, this.path, { cause: err });
    }

    let data: unknown;
    try {
      data = this.format === 'yaml' ? parse(content) : JSON.parse(content);
    } catch (err) {
      throw new GraphStoreError(`Cannot decode snapshot ${this.path}`, this.path, { cause: err });
    }

    try {
      return parseSnapshot(data);
    } catch (err) {
      if (err instanceof SnapshotError) {
        throw new GraphStoreError(
          `Invalid snapshot ${this.path}: ${err.message}`,
          this.path,
          { cause: err }
        );
      }
      throw err;
    }
  }

  save(graph: WordGraph): void {
    const snapshot = graph.toSnapshot();
    const content =
      this.format === 'yaml'
        ? stringify(snapshot, { lineWidth: 0 })
        : JSON.stringify(snapshot);

    try {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(this.path, content, 'utf-8');
    } catch (err) {
      throw new GraphStoreError(`Cannot write snapshot ${this.path}`, this.path, { cause: err });
    }
  }
}
