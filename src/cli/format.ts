/**
 * Console formatting for CLI output.
 */

import chalk from 'chalk';
import type { LadderResult } from '../core/types.js';

/**
 * Word pairs exercised by the demo command.
 */
export const DEMO_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['cat', 'dog'],
  ['ape', 'man'],
  ['pig', 'sty'],
  ['pen', 'ink'],
  ['one', 'two'],
  ['bat', 'cry'],
  ['goat', 'fish'],
  ['bake', 'farm'],
  ['lawn', 'brat'],
  ['snake', 'cards'],
  ['plant', 'graph'],
];

/**
 * Describe a ladder result on one line.
 */
export function formatLadder(from: string, to: string, result: LadderResult): string {
  if (result.found) {
    const steps = result.path.length - 1;
    return `${result.path.join(' -> ')} ${chalk.gray(`(${steps} ${steps === 1 ? 'step' : 'steps'})`)}`;
  }
  switch (result.reason) {
    case 'length-mismatch':
      return chalk.yellow(`"${from}" and "${to}" have different lengths`);
    case 'unknown-word':
      return chalk.yellow(`"${result.word ?? from}" is not in the dictionary`);
    case 'disconnected':
      return chalk.yellow(`"${from}" and "${to}" are in different forests`);
    case 'unreachable':
      return chalk.red(`no ladder found between "${from}" and "${to}"`);
  }
}
