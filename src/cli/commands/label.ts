/**
 * Manual labelling and overrides:
 * - banline label safe "..." → retrain toward safe and remember
 * - banline label bad "..."  → retrain toward unsafe and forget
 */

import { Argument, Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { categoryOption, openClassifier, reportFailure } from '../session.js';
import { icons, success, warning, formatVerdict } from '../ui.js';

export const verdictArgument = () =>
  new Argument('<verdict>', 'safe or bad').choices(['safe', 'bad'] as const);

export const labelCommand = new Command('label')
  .description('Label text as safe or bad (overrides any earlier decision)')
  .addArgument(verdictArgument())
  .argument('<text...>', 'Text to label')
  .addOption(categoryOption())
  .action((verdict, text, options) => {
    const fullText = text.join(' ');

    try {
      const classifier = openClassifier();
      const outcome = classifier.setLabel(fullText, verdict === 'safe', options.category);
      classifier.save();

      const banned = classifier.isBanned(outcome.score);
      console.log();
      if (outcome.safe && !outcome.stored) {
        console.log(warning(outcome.message));
      } else {
        console.log(success(outcome.message));
      }
      console.log(`   ${outcome.safe ? icons.safe : icons.banned} ${chalk.white(fullText)}`);
      console.log(`   ${chalk.gray('Score now:')} ${formatVerdict(outcome.score, banned)}`);
      console.log();
    } catch (err) {
      reportFailure(err);
    }
  });
