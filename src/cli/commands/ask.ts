import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { categoryOption, openClassifier, reportFailure } from '../session.js';
import { emptyState, icons } from '../ui.js';

export const askCommand = new Command('ask')
  .description('Find the closest remembered item to a prompt')
  .argument('<prompt...>', 'Prompt to match')
  .addOption(categoryOption())
  .action((prompt, options) => {
    const fullPrompt = prompt.join(' ');

    try {
      const classifier = openClassifier();
      const match = classifier.findMatch(fullPrompt, options.category);

      if (!match) {
        emptyState(`No close match for "${fullPrompt}"`, 'Teach more items with `banline label safe`.');
        return;
      }

      const percentage = Math.round(match.similarity * 100);
      console.log();
      console.log(`${icons.search} ${chalk.white(match.text)}`);
      console.log(`   ${chalk.gray(`${percentage}% match`)}`);
      console.log();
    } catch (err) {
      reportFailure(err);
    }
  });
