/**
 * Word admission and one-character distance.
 */

import { InvalidFilterOptionsError } from './errors.js';
import type { WordFilterOptions } from './types.js';

const LOWERCASE_LETTERS = /^\p{Ll}+$/u;
const ASTRAL = /[\u{10000}-\u{10FFFF}]/u;

/**
 * Whether a dictionary line is a lowercase, letters-only word.
 *
 * Only letters from the Basic Multilingual Plane are admitted, so a word's
 * `length` is also its character count.
 */
export function isValidWord(word: string): boolean {
  return LOWERCASE_LETTERS.test(word) && !ASTRAL.test(word);
}

function checkBound(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidFilterOptionsError(
      `${name} must be a positive integer, got ${value}`
    );
  }
}

/**
 * Build a word predicate, optionally bounded to `[minLength, maxLength]`.
 */
export function createWordFilter(
  options: WordFilterOptions = {}
): (word: string) => boolean {
  const { minLength, maxLength } = options;
  checkBound('minLength', minLength);
  checkBound('maxLength', maxLength);
  if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
    throw new InvalidFilterOptionsError(
      `minLength (${minLength}) is greater than maxLength (${maxLength})`
    );
  }

  return (word) => {
    if (minLength !== undefined && word.length < minLength) return false;
    if (maxLength !== undefined && word.length > maxLength) return false;
    return isValidWord(word);
  };
}

/**
 * Number of positions at which two words differ.
 *
 * Words of different lengths are never comparable: returns Infinity.
 */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) return Infinity;

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    if (a.charCodeAt(i) !== b.charCodeAt(i)) distance++;
  }
  return distance;
}

/**
 * Whether two words differ at exactly one position.
 */
export function areNeighbors(a: string, b: string): boolean {
  if (a.length !== b.length) return false;

  let changed = false;
  for (let i = 0; i < a.length; i++) {
    if (a.charCodeAt(i) !== b.charCodeAt(i)) {
      if (changed) return false;
      changed = true;
    }
  }
  return changed;
}
