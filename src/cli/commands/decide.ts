import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { categoryOption, openClassifier, reportFailure } from '../session.js';
import { formatVerdict, icons } from '../ui.js';

export const decideCommand = new Command('decide')
  .description('Let the classifier decide; safe items are remembered')
  .argument('<text...>', 'Text to classify')
  .addOption(categoryOption())
  .action((text, options) => {
    const fullText = text.join(' ');

    try {
      const classifier = openClassifier();
      const decision = classifier.aiDecide(fullText, options.category);
      classifier.save();

      console.log();
      console.log(`   ${icons.brain} AI says: ${formatVerdict(decision.score, !decision.safe)}`);
      console.log(
        decision.safe
          ? chalk.gray('   Added.')
          : chalk.gray('   Not added (override with `banline label safe` if wrong).')
      );
      console.log();
    } catch (err) {
      reportFailure(err);
    }
  });
