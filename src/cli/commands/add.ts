import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { categoryLabel } from '../../memory/types.js';
import { categoryOption, openClassifier, reportFailure } from '../session.js';
import { verdictArgument } from './label.js';
import { icons, success, info } from '../ui.js';

export const addCommand = new Command('add')
  .description('Train on an item and add it to a category')
  .addArgument(verdictArgument())
  .argument('<text...>', 'Word, phrase or game idea')
  .addOption(categoryOption())
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('banline add safe')} "rainbow" ${chalk.gray('-c words')}
  ${chalk.cyan('banline add safe')} "treasure hunt with riddles" ${chalk.gray('-c game_ideas')}
  ${chalk.cyan('banline add bad')} "go away loser"
`)
  .action((verdict, text, options) => {
    const fullText = text.join(' ');
    const safe = verdict === 'safe';

    try {
      const classifier = openClassifier();
      const stored = classifier.addItem(fullText, safe, options.category);
      classifier.save();

      const label = categoryLabel(options.category);
      console.log();
      if (stored) {
        console.log(success(`${chalk.bold('Added')} to ${label}`));
      } else {
        console.log(info(`Trained, not added to ${label} (above the ban line)`));
      }
      console.log(`   ${icons[options.category]} ${chalk.white(fullText)}`);
      console.log();
    } catch (err) {
      reportFailure(err);
    }
  });
