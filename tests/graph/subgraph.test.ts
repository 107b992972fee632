/**
 * Tests for same-length subgraphs: labeling, adjacency and shortest paths.
 */

import { describe, it, expect } from 'vitest';
import { SameLengthSubgraph } from '../../src/graph/subgraph.js';
import { SnapshotError, WordLengthMismatchError } from '../../src/core/errors.js';
import { hammingDistance } from '../../src/core/words.js';
import { gridDictionary, isValidLadder, referenceDistance } from '../fixtures.js';

function makeSubgraph(words: string[]): SameLengthSubgraph {
  const subgraph = new SameLengthSubgraph(3);
  for (const word of words) subgraph.addWord(word);
  return subgraph;
}

const ANIMALS = ['cat', 'cot', 'cog', 'dog', 'cag', 'pig'];

describe('addWord', () => {
  it('should insert an unlabeled node with no neighbors', () => {
    const subgraph = makeSubgraph(['cat']);
    const node = subgraph.getNode('cat');

    expect(node?.label).toBe(0);
    expect(node?.neighbors).toEqual([]);
  });

  it('should ignore duplicate words', () => {
    const subgraph = makeSubgraph(['cat', 'cat']);
    expect(subgraph.totalWords).toBe(1);
  });

  it('should reject a word of the wrong length', () => {
    const subgraph = new SameLengthSubgraph(3);
    expect(() => subgraph.addWord('goat')).toThrow(WordLengthMismatchError);
  });
});

describe('computeNeighbors', () => {
  it('should return the words one change away', () => {
    const subgraph = makeSubgraph(ANIMALS);
    const node = subgraph.getNode('cat');
    expect(node).toBeDefined();
    if (!node) return;

    expect(subgraph.computeNeighbors(node).sort()).toEqual(['cag', 'cot']);
  });

  it('should not list the word itself', () => {
    const subgraph = makeSubgraph(['pig']);
    const node = subgraph.getNode('pig');
    if (!node) throw new Error('pig missing');
    expect(subgraph.computeNeighbors(node)).toEqual([]);
  });
});

describe('exploreComponent', () => {
  it('should label the whole component reachable from the seed', () => {
    const subgraph = makeSubgraph(ANIMALS);
    const seed = subgraph.getNode('dog');
    if (!seed) throw new Error('dog missing');

    expect(subgraph.exploreComponent(seed)).toBe(5);

    const label = subgraph.getNode('dog')?.label ?? 0;
    expect(label).toBeGreaterThan(0);
    for (const word of ['cat', 'cot', 'cog', 'cag']) {
      expect(subgraph.getNode(word)?.label).toBe(label);
    }
    expect(subgraph.getNode('pig')?.label).toBe(0);
  });

  it('should label nothing when the seed is already labeled', () => {
    const subgraph = makeSubgraph(ANIMALS);
    const seed = subgraph.getNode('cat');
    if (!seed) throw new Error('cat missing');

    subgraph.exploreComponent(seed);
    expect(subgraph.exploreComponent(seed)).toBe(0);
  });
});

describe('exploreAllComponents', () => {
  it('should give every component its own positive label', () => {
    const subgraph = makeSubgraph(ANIMALS);

    expect(subgraph.exploreAllComponents()).toBe(2);
    expect(subgraph.totalForests).toBe(2);

    const catLabel = subgraph.getNode('cat')?.label ?? 0;
    const pigLabel = subgraph.getNode('pig')?.label ?? 0;
    expect(catLabel).toBeGreaterThan(0);
    expect(pigLabel).toBeGreaterThan(0);
    expect(catLabel).not.toBe(pigLabel);
  });

  it('should keep adjacency within distance one and symmetric', () => {
    const words = gridDictionary();
    const subgraph = makeSubgraph(words);
    subgraph.exploreAllComponents();

    for (const word of words) {
      const node = subgraph.getNode(word);
      expect(node?.label).toBeGreaterThan(0);
      for (const neighbor of subgraph.neighborsOf(word)) {
        expect(neighbor).toHaveLength(word.length);
        expect(hammingDistance(word, neighbor)).toBe(1);
        expect(subgraph.neighborsOf(neighbor)).toContain(word);
      }
    }

    for (const u of words) {
      for (const v of words) {
        const uv = subgraph.neighborsOf(u).includes(v);
        const vu = subgraph.neighborsOf(v).includes(u);
        expect(uv).toBe(vu);
      }
    }
  });

  it('should freeze adjacency after labeling', () => {
    const subgraph = makeSubgraph(ANIMALS);
    subgraph.exploreAllComponents();
    expect(Object.isFrozen(subgraph.neighborsOf('cat'))).toBe(true);
  });

  it('should count component sizes', () => {
    const subgraph = makeSubgraph(ANIMALS);
    subgraph.exploreAllComponents();

    const sizes = [...subgraph.componentSizes().values()].sort((a, b) => a - b);
    expect(sizes).toEqual([1, 5]);
    expect(subgraph.largestForest()).toBe(5);
  });

  it('should report no largest forest for an empty subgraph', () => {
    const subgraph = new SameLengthSubgraph(3);
    subgraph.exploreAllComponents();
    expect(subgraph.largestForest()).toBe(0);
  });
});

describe('areConnected', () => {
  const subgraph = makeSubgraph(ANIMALS);
  subgraph.exploreAllComponents();

  it('should connect words in the same forest', () => {
    expect(subgraph.areConnected('cat', 'dog')).toBe(true);
    expect(subgraph.areConnected('dog', 'cat')).toBe(true);
  });

  it('should not connect words in different forests', () => {
    expect(subgraph.areConnected('cat', 'pig')).toBe(false);
  });

  it('should return false for unknown words', () => {
    expect(subgraph.areConnected('cat', 'zzz')).toBe(false);
    expect(subgraph.areConnected('zzz', 'zzz')).toBe(false);
  });

  it('should be an equivalence relation', () => {
    const words = gridDictionary();
    const grid = makeSubgraph(words);
    grid.exploreAllComponents();

    for (const a of words) {
      expect(grid.areConnected(a, a)).toBe(true);
      for (const b of words) {
        expect(grid.areConnected(a, b)).toBe(grid.areConnected(b, a));
        for (const c of words) {
          if (grid.areConnected(a, b) && grid.areConnected(b, c)) {
            expect(grid.areConnected(a, c)).toBe(true);
          }
        }
      }
    }
  });
});

describe('shortestPath', () => {
  it('should find a four-word ladder from cat to dog', () => {
    const subgraph = makeSubgraph(ANIMALS);
    subgraph.exploreAllComponents();

    const path = subgraph.shortestPath('cat', 'dog');
    expect(path).not.toBeNull();
    if (!path) return;

    expect(path).toHaveLength(4);
    expect(path[0]).toBe('cat');
    expect(path[3]).toBe('dog');
    expect(isValidLadder(path)).toBe(true);
  });

  it('should return a single word for identical endpoints', () => {
    const subgraph = makeSubgraph(ANIMALS);
    subgraph.exploreAllComponents();
    expect(subgraph.shortestPath('cog', 'cog')).toEqual(['cog']);
  });

  it('should return null across forests', () => {
    const subgraph = makeSubgraph(ANIMALS);
    subgraph.exploreAllComponents();
    expect(subgraph.shortestPath('cat', 'pig')).toBeNull();
  });

  it('should match the breadth-first distance for every connected pair', () => {
    const words = gridDictionary();
    const subgraph = makeSubgraph(words);
    subgraph.exploreAllComponents();

    for (const from of words) {
      for (const to of words) {
        const path = subgraph.shortestPath(from, to);
        const distance = referenceDistance(words, from, to);
        if (distance < 0) {
          expect(path).toBeNull();
          continue;
        }
        expect(subgraph.areConnected(from, to)).toBe(true);
        expect(path?.length).toBe(distance + 1);
        expect(path?.[0]).toBe(from);
        expect(path?.[distance]).toBe(to);
        expect(isValidLadder(path ?? [])).toBe(true);
      }
    }
  });
});

describe('findLadder', () => {
  const subgraph = makeSubgraph(ANIMALS);
  subgraph.exploreAllComponents();

  it('should name the first unknown word', () => {
    expect(subgraph.findLadder('cat', 'zzz')).toEqual({
      found: false,
      reason: 'unknown-word',
      word: 'zzz',
    });
  });

  it('should report disconnected forests', () => {
    expect(subgraph.findLadder('pig', 'dog')).toEqual({
      found: false,
      reason: 'disconnected',
    });
  });

  it('should report an unreachable pair that shares a label', () => {
    const broken = SameLengthSubgraph.fromSnapshot({
      length: 3,
      nextLabel: 2,
      nodes: [
        { word: 'cat', label: 1, neighbors: [] },
        { word: 'dog', label: 1, neighbors: [] },
      ],
    });

    expect(broken.areConnected('cat', 'dog')).toBe(true);
    expect(broken.findLadder('cat', 'dog')).toEqual({
      found: false,
      reason: 'unreachable',
    });
    expect(broken.shortestPath('cat', 'dog')).toBeNull();
  });
});

describe('snapshots', () => {
  it('should restore words, labels and adjacency', () => {
    const subgraph = makeSubgraph(ANIMALS);
    subgraph.exploreAllComponents();

    const restored = SameLengthSubgraph.fromSnapshot(subgraph.toSnapshot());

    expect(restored.totalWords).toBe(6);
    expect(restored.totalForests).toBe(2);
    for (const word of ANIMALS) {
      expect(restored.getNode(word)?.label).toBe(subgraph.getNode(word)?.label);
      expect([...restored.neighborsOf(word)].sort()).toEqual(
        [...subgraph.neighborsOf(word)].sort()
      );
    }
  });

  it('should reject words of the wrong length', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 2,
        nodes: [{ word: 'goat', label: 1, neighbors: [] }],
      })
    ).toThrow(SnapshotError);
  });

  it('should reject unlabeled nodes', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 2,
        nodes: [{ word: 'cat', label: 0, neighbors: [] }],
      })
    ).toThrow('"cat" has invalid label 0');
  });

  it('should reject neighbors that are absent or too far away', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 2,
        nodes: [{ word: 'cat', label: 1, neighbors: ['cot'] }],
      })
    ).toThrow('"cat" lists invalid neighbor "cot"');

    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 2,
        nodes: [
          { word: 'cat', label: 1, neighbors: ['dog'] },
          { word: 'dog', label: 1, neighbors: ['cat'] },
        ],
      })
    ).toThrow('"cat" lists invalid neighbor "dog"');
  });

  it('should reject one-sided adjacency', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 2,
        nodes: [
          { word: 'cat', label: 1, neighbors: ['cot'] },
          { word: 'cot', label: 1, neighbors: [] },
        ],
      })
    ).toThrow('"cot" does not list its neighbor "cat"');
  });

  it('should reject a label counter that does not match the forests', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 50,
        nodes: [{ word: 'cat', label: 7, neighbors: [] }],
      })
    ).toThrow('nextLabel 50 does not match 1 labeled forests');
  });

  it('should reject duplicate words', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 2,
        nodes: [
          { word: 'cat', label: 1, neighbors: [] },
          { word: 'cat', label: 1, neighbors: [] },
        ],
      })
    ).toThrow('Duplicate entry for "cat"');
  });

  it('should reject neighbors with different labels', () => {
    expect(() =>
      SameLengthSubgraph.fromSnapshot({
        length: 3,
        nextLabel: 3,
        nodes: [
          { word: 'cat', label: 1, neighbors: ['cot'] },
          { word: 'cot', label: 2, neighbors: ['cat'] },
        ],
      })
    ).toThrow(SnapshotError);
  });
});
