/**
 * Visual formatting helpers for terminal output
 */

import chalk from 'chalk';
import type { Category } from '../memory/types.js';

/**
 * Icons for categories and verdicts
 */
export const icons = {
  // Categories
  words: '\u{1F524}',      // input latin letters
  phrases: '\u{1F4AC}',    // speech bubble
  game_ideas: '\u{1F3B2}', // game die

  // Verdicts
  safe: '\u{2705}',        // green check
  banned: '\u{1F6AB}',     // prohibited
  brain: '\u{1F9E0}',      // brain - learning
  search: '\u{1F50D}',     // magnifying glass
};

/**
 * Category color map
 */
export const categoryColors: Record<Category, typeof chalk> = {
  words: chalk.magenta,
  phrases: chalk.blue,
  game_ideas: chalk.green,
};

/**
 * Render a 0-1 score with a bar and the ban line marked
 */
export function scoreBar(score: number, banThreshold: number, width: number = 20): string {
  const filled = Math.round(Math.max(0, Math.min(1, score)) * width);
  const line = Math.min(width - 1, Math.round(banThreshold * width));
  let bar = '';
  for (let i = 0; i < width; i++) {
    const cell = i < filled ? '█' : '░';
    if (i === line) {
      bar += chalk.red('│');
    } else {
      bar += i < filled ? (i >= line ? chalk.red(cell) : chalk.green(cell)) : chalk.gray(cell);
    }
  }
  return `[${bar}]`;
}

/**
 * Score with its verdict, e.g. "0.123 (SAFE)"
 */
export function formatVerdict(score: number, banned: boolean): string {
  const value = score.toFixed(3);
  return banned
    ? `${chalk.red(value)} ${chalk.bold.red('(INAPPROPRIATE)')}`
    : `${chalk.green(value)} ${chalk.bold.green('(SAFE)')}`;
}

/**
 * Print the allowed items of one category
 */
export function printCategory(category: Category, label: string, items: string[]): void {
  const colorFn = categoryColors[category];
  console.log();
  console.log(`${icons[category]} ${colorFn.bold(label)} ${chalk.gray(`(${items.length})`)}`);
  console.log(colorFn('─'.repeat(30)));
  if (items.length === 0) {
    console.log(chalk.gray('   (nothing yet)'));
  }
  for (const item of items) {
    console.log(`   ${chalk.white(item)}`);
  }
}

/**
 * Print an empty state message
 */
export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

/**
 * Success message with green checkmark
 */
export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

/**
 * Error message with red X
 */
export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

/**
 * Warning message with yellow warning sign
 */
export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

/**
 * Info message with blue info icon
 */
export function info(message: string): string {
  return chalk.blue('ℹ') + ' ' + message;
}

/**
 * Key-value pair display
 */
export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  const paddedKey = key.padEnd(width);
  return `${chalk.cyan(paddedKey)} ${value}`;
}
