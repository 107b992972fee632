/**
 * Dictionary input: one candidate word per line.
 */

import { readFileSync } from 'fs';
import { WordSourceError } from '../core/errors.js';

/**
 * Default system word list.
 */
export const DEFAULT_DICTIONARY = '/usr/share/dict/words';

/**
 * Anything that yields the full list of candidate words.
 */
export interface WordSource {
  readonly description: string;
  readWords(): string[];
}

/**
 * Split dictionary text into lines, accepting LF or CRLF endings.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Reads a word list from a file on disk.
 */
export class FileWordSource implements WordSource {
  constructor(readonly path: string = DEFAULT_DICTIONARY) {}

  get description(): string {
    return this.path;
  }

  readWords(): string[] {
    let content: string;
    try {
      content = readFileSync(this.path, 'utf-8');
    } catch (err) {
      throw new WordSourceError(this.path, { cause: err });
    }
    return splitLines(content);
  }
}

/**
 * A fixed in-memory word list.
 */
export class ArrayWordSource implements WordSource {
  readonly description = 'in-memory word list';

  constructor(private readonly words: readonly string[]) {}

  readWords(): string[] {
    return [...this.words];
  }
}
