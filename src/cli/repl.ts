/**
 * Interactive labelling loop
 *
 * Enter a phrase, then choose how to handle it:
 * - [s]afe / [b]ad: label it yourself
 * - [a]i decide: let the classifier decide (safe items are remembered)
 * - [os] / [ob]: override an earlier decision
 *
 * Memory is saved after every labelled phrase and on exit.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { Classifier } from '../classifier/classifier.js';
import { CATEGORIES, categoryLabel, isCategory, type Category } from '../memory/types.js';
import { formatVerdict, icons, printCategory } from './ui.js';

export type ReplChoice = 'safe' | 'bad' | 'ai' | 'override-safe' | 'override-bad';

export interface ReplConfig {
  category: Category;
}

export interface ReplIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal: boolean;
}

const CHOICE_PROMPT =
  '  Safe [s] / Bad [b] / AI decide [a] / Override Safe [os] / Override Bad [ob]: ';

export function parseChoice(input: string): ReplChoice | null {
  switch (input.trim().toLowerCase()) {
    case 's':
    case 'safe':
      return 'safe';
    case 'b':
    case 'bad':
      return 'bad';
    case 'a':
    case 'ai':
      return 'ai';
    case 'os':
    case 'override safe':
      return 'override-safe';
    case 'ob':
    case 'override bad':
      return 'override-bad';
    default:
      return null;
  }
}

export class Repl {
  private rl: readline.Interface | null = null;
  private pending: string | null = null;
  private closed = false;
  private config: ReplConfig;
  private io: ReplIO;

  constructor(
    private classifier: Classifier,
    config: Partial<ReplConfig> = {},
    io: Partial<ReplIO> = {}
  ) {
    this.config = { category: 'phrases', ...config };
    this.io = { input: process.stdin, output: process.stdout, terminal: true, ...io };
  }

  /**
   * Start the REPL; resolves when the input stream closes.
   */
  start(): Promise<void> {
    this.closed = false;
    this.rl = readline.createInterface({
      input: this.io.input,
      output: this.io.output,
      terminal: this.io.terminal,
    });

    this.printWelcome();

    return new Promise((resolve) => {
      const rl = this.rl;
      if (!rl) {
        resolve();
        return;
      }

      rl.on('line', (line) => {
        try {
          this.handleLine(line);
        } catch (error) {
          if (error instanceof Error) {
            console.error(chalk.red(`\nError: ${error.message}\n`));
          }
        }
        // prompt() would resume the input of a closed interface
        if (!this.closed) {
          this.prompt();
        }
      });

      rl.on('close', () => {
        this.closed = true;
        this.cleanup();
        resolve();
      });

      this.prompt();
    });
  }

  private prompt(): void {
    this.rl?.setPrompt(this.pending === null ? chalk.cyan('Phrase: ') : CHOICE_PROMPT);
    this.rl?.prompt();
  }

  private printWelcome(): void {
    console.log();
    console.log(chalk.bold.cyan('Banline') + chalk.gray(' - kid-friendly filter'));
    console.log(chalk.gray(`Category: ${categoryLabel(this.config.category)}`));
    console.log();
    console.log(chalk.gray('Enter a phrase, then: [s]afe  [b]ad  [a]i decide  [o]verride'));
    console.log(chalk.gray('Commands: list | score <text> | category <name> | help | quit'));
    console.log();
  }

  private handleLine(line: string): void {
    const text = line.trim();

    if (this.pending !== null) {
      const phrase = this.pending;
      const choice = parseChoice(text);
      this.pending = null;
      if (choice === null) {
        console.log(chalk.yellow('Use s, b, a, os, or ob.'));
        return;
      }
      this.applyChoice(phrase, choice);
      this.classifier.save();
      return;
    }

    if (!text) {
      return;
    }

    const lower = text.toLowerCase();
    if (lower === 'quit') {
      this.rl?.close();
      return;
    }
    if (lower === 'help') {
      this.printWelcome();
      return;
    }
    if (lower === 'list') {
      for (const category of CATEGORIES) {
        printCategory(category, categoryLabel(category), this.classifier.list(category));
      }
      console.log();
      return;
    }
    if (lower.startsWith('score ')) {
      const target = text.slice(6).trim();
      const score = this.classifier.score(target);
      console.log(`Score: ${formatVerdict(score, this.classifier.isBanned(score))}`);
      return;
    }
    if (lower.startsWith('category ')) {
      this.switchCategory(text.slice(9).trim());
      return;
    }

    this.pending = text;
  }

  private applyChoice(phrase: string, choice: ReplChoice): void {
    const category = this.config.category;

    switch (choice) {
      case 'safe':
      case 'override-safe':
        console.log(`${icons.safe} ${this.classifier.setLabel(phrase, true, category).message}`);
        break;

      case 'bad':
      case 'override-bad':
        console.log(`${icons.banned} ${this.classifier.setLabel(phrase, false, category).message}`);
        break;

      case 'ai': {
        const { safe, score } = this.classifier.aiDecide(phrase, category);
        const note = safe ? 'Added.' : 'Not added (override with Safe if wrong).';
        console.log(`${icons.brain} AI says: ${formatVerdict(score, !safe)}. ${note}`);
        break;
      }
    }
  }

  private switchCategory(name: string): void {
    if (!isCategory(name)) {
      console.log(chalk.yellow(`Unknown category: ${name}. Use ${CATEGORIES.join(', ')}.`));
      return;
    }
    this.config.category = name;
    console.log(chalk.gray(`Category: ${categoryLabel(name)}`));
  }

  private cleanup(): void {
    this.classifier.save();
    console.log(chalk.gray('\nSaved. Goodbye!\n'));
  }
}
