/**
 * Console output for the command line (outside the pager)
 */

import chalk from 'chalk';
import type { Section } from '../showcase/types.js';

// Brand color
const brandRed = chalk.hex('#f02a30');

export function printError(message: string): void {
  console.error(`${chalk.red('Error:')} ${message}`);
}

/**
 * List sections, marking the ones that would be shown
 */
export function printSectionList(sections: readonly Section[], shown: ReadonlySet<string>): void {
  const idWidth = Math.max(...sections.map(section => section.id.length));
  for (const section of sections) {
    const marker = shown.has(section.id) ? brandRed('*') : ' ';
    console.log(`${marker} ${chalk.bold(section.id.padEnd(idWidth))}  ${chalk.gray(section.title)}`);
  }
}

export function printDocument(
  lines: readonly string[],
  output: { write(chunk: string): unknown } = process.stdout
): void {
  output.write(lines.join('\n') + '\n');
}
