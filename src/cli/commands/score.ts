import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { openClassifier, reportFailure } from '../session.js';
import { formatVerdict, scoreBar } from '../ui.js';

export const scoreCommand = new Command('score')
  .description('Score text from 0 (safe) to 1 (inappropriate)')
  .argument('<text...>', 'Text to score')
  .option('--json', 'Print the result as JSON')
  .action((text, options) => {
    const fullText = text.join(' ');

    try {
      const classifier = openClassifier();
      const score = classifier.score(fullText);
      const banned = classifier.isBanned(score);

      if (options.json) {
        console.log(JSON.stringify({ text: fullText, score, banned }));
        return;
      }

      console.log();
      console.log(`   ${chalk.white(fullText)}`);
      console.log(`   ${scoreBar(score, classifier.settings.banThreshold)} ${formatVerdict(score, banned)}`);
      console.log();
    } catch (err) {
      reportFailure(err);
    }
  });
