/**
 * Shared word lists and helpers for graph tests.
 */

import { hammingDistance } from '../src/core/words.js';

/**
 * cat, cot, cog, dog and cag form one forest; pig stands alone.
 */
export const SMALL_DICTIONARY = [
  'cat',
  'cot',
  'cog',
  'dog',
  'cag',
  'pig',
  'goat',
  'Zzz',
  'zz9',
  "cat's",
  '',
];

/**
 * Every three-letter word over {a, b, c} except a few holes, plus two
 * isolated words.
 */
export function gridDictionary(): string[] {
  const letters = ['a', 'b', 'c'];
  const holes = new Set(['bbb', 'abc', 'cab']);
  const words: string[] = [];
  for (const x of letters) {
    for (const y of letters) {
      for (const z of letters) {
        const word = x + y + z;
        if (!holes.has(word)) words.push(word);
      }
    }
  }
  return [...words, 'xyz', 'qrs'];
}

/**
 * Breadth-first hop count between two words using only the word list,
 * independent of the graph under test. Returns -1 when unreachable.
 */
export function referenceDistance(words: string[], from: string, to: string): number {
  const dist = new Map<string, number>([[from, 0]]);
  const frontier = [from];
  for (let i = 0; i < frontier.length; i++) {
    const current = frontier[i];
    if (current === undefined) break;
    const d = dist.get(current) ?? 0;
    if (current === to) return d;
    for (const word of words) {
      if (!dist.has(word) && hammingDistance(current, word) === 1) {
        dist.set(word, d + 1);
        frontier.push(word);
      }
    }
  }
  return -1;
}

/**
 * Whether each consecutive pair of the ladder differs at exactly one position.
 */
export function isValidLadder(path: string[]): boolean {
  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const next = path[i];
    if (prev === undefined || next === undefined) return false;
    if (hammingDistance(prev, next) !== 1) return false;
  }
  return true;
}
