import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { categoryOption, openClassifier, reportFailure } from '../session.js';
import { success, info } from '../ui.js';

export const forgetCommand = new Command('forget')
  .description('Remove an item from memory without retraining')
  .argument('<text...>', 'Exact text to remove')
  .addOption(categoryOption())
  .action((text, options) => {
    const fullText = text.join(' ');

    try {
      const classifier = openClassifier();
      const removed = classifier.forget(fullText, options.category);
      classifier.save();

      console.log(
        removed
          ? success(`Forgot ${chalk.white(`"${fullText}"`)}`)
          : info(`"${fullText}" was not in ${options.category}`)
      );
    } catch (err) {
      reportFailure(err);
    }
  });
